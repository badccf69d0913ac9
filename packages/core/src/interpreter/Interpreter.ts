import {
    ErrorCode,
    NOTHING,
    NativeFunction,
    SourceLocation,
    StepsError,
    StepsTypeError,
    StepsValue,
    addedTo,
    arithmetic,
    asNumber,
    asText,
    assignIndex,
    characterAt,
    compare,
    contains,
    convert,
    displayString,
    endsWith,
    formatDecimal,
    indexValue,
    isIn,
    isTruthy,
    isType,
    lengthOf,
    list,
    makeError,
    natives as builtinNatives,
    negate,
    boolean,
    number,
    splitBy,
    startsWith,
    table,
    text,
    typeOf,
    valuesEqual,
} from "@stepslang/library";
import { Expression } from "../parser/expressions";
import {
    AttemptStatement,
    CallStatement,
    IfStatement,
    RepeatForEachStatement,
    RepeatTimesStatement,
    RepeatWhileStatement,
    Statement,
} from "../parser/statements";
import { BuildingNode, Callable, StepNode } from "../parser/structure";
import { Environment, EnvironmentOptions } from "./Environment";
import { EXIT, HALT, NORMAL, Outcome, failed, returned } from "./Outcome";

export interface ExecutionResult {
    success: boolean;
    returnValue: StepsValue;
    error?: StepsError;
    /** Every line sent to the output handler during the run. */
    output: string[];
}

export interface InterpreterOptions extends EnvironmentOptions {
    natives?: Record<string, NativeFunction>;
}

export class Interpreter {
    public readonly environment: Environment;
    /** Set when a run must unwind without running another statement. */
    protected halted: boolean = false;

    private natives: Map<string, NativeFunction>;
    private output: string[] = [];

    constructor(
        environment: Environment = new Environment(),
        natives: Record<string, NativeFunction> = builtinNatives,
    ) {
        this.environment = environment;
        this.natives = new Map(Object.entries(natives));
    }

    public async runBuilding(building: BuildingNode): Promise<ExecutionResult> {
        this.output = [];
        this.halted = false;
        this.environment.globalFrame.line = building.loc.line;
        const outcome = await this.executeBlock(building.body);
        return this.toResult(outcome);
    }

    /** Runs top-level statements, e.g. one REPL entry, in the global frame. */
    public async runStatements(
        statements: Statement[],
    ): Promise<ExecutionResult> {
        this.output = [];
        this.halted = false;
        const outcome = await this.executeBlock(statements);
        return this.toResult(outcome);
    }

    public async callStep(
        name: string,
        args: StepsValue[],
        loc?: SourceLocation,
    ): Promise<StepsValue> {
        const outcome = await this.call(name, args, loc);
        if (outcome.kind === "error") throw outcome.error;
        return outcome.kind === "return" ? outcome.value : NOTHING;
    }

    // Hooks for the debugger

    protected async beforeStatement(_statement: Statement): Promise<void> {}

    protected onStepEnter(_name: string, _loc: SourceLocation): void {}

    protected onStepExit(_name: string): void {}

    // Statements

    public async executeStatement(statement: Statement): Promise<Outcome> {
        this.environment.currentFrame.line = statement.loc.line;
        try {
            await this.beforeStatement(statement);
            if (this.halted) return HALT;
            return await this.dispatch(statement);
        } catch (e) {
            return failed(this.toStepsError(e, statement.loc));
        }
    }

    private async dispatch(statement: Statement): Promise<Outcome> {
        const env = this.environment;

        switch (statement.kind) {
            case "DisplayStatement": {
                const value = await this.evaluateExpression(statement.value);
                this.emit(displayString(value));
                return NORMAL;
            }
            case "SetStatement": {
                const value = await this.evaluateExpression(statement.value);
                env.setVariable(statement.target, value, statement.loc);
                return NORMAL;
            }
            case "SetIndexStatement": {
                const container = env.getVariable(
                    statement.target,
                    statement.loc,
                );
                const key = await this.evaluateExpression(statement.index);
                const value = await this.evaluateExpression(statement.value);
                assignIndex(container, key, value);
                return NORMAL;
            }
            case "CallStatement":
                return this.executeCall(statement);
            case "ReturnStatement": {
                const value = statement.value
                    ? await this.evaluateExpression(statement.value)
                    : NOTHING;
                return returned(value);
            }
            case "ExitStatement":
                return EXIT;
            case "IfStatement":
                return this.executeIf(statement);
            case "RepeatTimesStatement":
                return this.executeRepeatTimes(statement);
            case "RepeatForEachStatement":
                return this.executeRepeatForEach(statement);
            case "RepeatWhileStatement":
                return this.executeRepeatWhile(statement);
            case "AttemptStatement":
                return this.executeAttempt(statement);
            case "AddToListStatement": {
                const item = await this.evaluateExpression(statement.item);
                this.requireList(statement.listName, "add to").add(item);
                return NORMAL;
            }
            case "RemoveFromListStatement": {
                const item = await this.evaluateExpression(statement.item);
                this.requireList(statement.listName, "remove from").remove(item);
                return NORMAL;
            }
        }
    }

    private async executeBlock(statements: Statement[]): Promise<Outcome> {
        for (const statement of statements) {
            const outcome = await this.executeStatement(statement);
            if (outcome.kind !== "normal") return outcome;
        }
        return NORMAL;
    }

    private async executeScoped(
        statements: Statement[],
        bind?: { name: string; value: StepsValue },
    ): Promise<Outcome> {
        this.environment.pushScope();
        try {
            if (bind) this.environment.defineLocal(bind.name, bind.value);
            return await this.executeBlock(statements);
        } finally {
            this.environment.popScope();
        }
    }

    private async executeCall(statement: CallStatement): Promise<Outcome> {
        const args: StepsValue[] = [];
        for (const arg of statement.args) {
            args.push(await this.evaluateExpression(arg));
        }
        const outcome = await this.call(statement.stepName, args, statement.loc);
        if (outcome.kind !== "return") return outcome;

        if (statement.resultTarget !== null) {
            this.environment.setVariable(
                statement.resultTarget,
                outcome.value,
                statement.loc,
            );
        }
        return NORMAL;
    }

    private async executeIf(statement: IfStatement): Promise<Outcome> {
        for (const branch of [statement.branch, ...statement.otherwiseIfs]) {
            const condition = await this.evaluateExpression(branch.condition);
            if (isTruthy(condition)) return this.executeScoped(branch.body);
        }
        if (statement.otherwise) return this.executeScoped(statement.otherwise);
        return NORMAL;
    }

    private async executeRepeatTimes(
        statement: RepeatTimesStatement,
    ): Promise<Outcome> {
        const count = await this.evaluateExpression(statement.count);
        if (count.type !== "number") {
            throw new StepsTypeError({
                code: ErrorCode.InvalidOperation,
                message: `'repeat ... times' requires a number, got ${count.type}.`,
                hint: "The repeat count must be a number.",
            });
        }

        const times = Math.trunc(count.value);
        for (let i = 0; i < times; i++) {
            const outcome = await this.executeScoped(statement.body);
            if (outcome.kind === "exit") return NORMAL;
            if (outcome.kind !== "normal") return outcome;
        }
        return NORMAL;
    }

    private async executeRepeatForEach(
        statement: RepeatForEachStatement,
    ): Promise<Outcome> {
        const collection = await this.evaluateExpression(statement.collection);
        let items: StepsValue[];
        switch (collection.type) {
            case "list":
                items = collection.value.toArray();
                break;
            case "text":
                items = [...collection.value].map((ch) => text(ch));
                break;
            case "table":
                items = collection.value.keys().map((key) => text(key));
                break;
            default:
                throw makeError(ErrorCode.NotIterable, {
                    type: collection.type,
                });
        }

        for (const item of items) {
            const outcome = await this.executeScoped(statement.body, {
                name: statement.itemName,
                value: item,
            });
            if (outcome.kind === "exit") return NORMAL;
            if (outcome.kind !== "normal") return outcome;
        }
        return NORMAL;
    }

    private async executeRepeatWhile(
        statement: RepeatWhileStatement,
    ): Promise<Outcome> {
        const limit = this.environment.iterationLimit;
        let iterations = 0;

        while (isTruthy(await this.evaluateExpression(statement.condition))) {
            if (iterations >= limit) {
                throw makeError(ErrorCode.IterationLimit, { limit });
            }
            iterations++;
            const outcome = await this.executeScoped(statement.body);
            if (outcome.kind === "exit") return NORMAL;
            if (outcome.kind !== "normal") return outcome;
        }
        return NORMAL;
    }

    /**
     * Runs the attempt body. An error outcome switches to the unsuccessful
     * body, with `problem_message` bound. `then continue` runs afterwards
     * whatever happened, unless the run is halting.
     */
    private async executeAttempt(statement: AttemptStatement): Promise<Outcome> {
        let outcome = await this.executeScoped(statement.body);

        if (outcome.kind === "error") {
            const problem = outcome.error;
            outcome = statement.unsuccessful
                ? await this.executeScoped(statement.unsuccessful, {
                      name: "problem_message",
                      value: text(problem.message),
                  })
                : NORMAL;
        }

        if (statement.thenContinue && outcome.kind !== "halt") {
            const after = await this.executeScoped(statement.thenContinue);
            if (after.kind !== "normal") return after;
        }
        return outcome;
    }

    // Calls

    /**
     * Resolves `name` as a riser of the running step, then a native
     * function, then a registered step.
     */
    private async call(
        name: string,
        args: StepsValue[],
        loc?: SourceLocation,
    ): Promise<Outcome> {
        const owner = this.environment.currentFrame.owner;
        const riser = owner?.findRiser(name);
        if (owner && riser) return this.invoke(riser, owner, args, loc);

        const fn = this.natives.get(name);
        if (fn) return returned(await this.callNative(name, fn, args, loc));

        const step = this.environment.resolveStep(name, loc);
        return this.invoke(step, step, args, loc);
    }

    private async callNative(
        name: string,
        fn: NativeFunction,
        args: StepsValue[],
        loc?: SourceLocation,
    ): Promise<StepsValue> {
        const params = fn.signature.params.map((param) => param.name);
        this.checkArgumentCount(name, params, args.length, loc);
        try {
            return await fn(...args);
        } catch (e) {
            throw this.toStepsError(e, loc);
        }
    }

    private async invoke(
        callable: Callable,
        owner: StepNode,
        args: StepsValue[],
        loc?: SourceLocation,
    ): Promise<Outcome> {
        const env = this.environment;
        this.checkArgumentCount(
            callable.name,
            callable.expects.map((param) => param.name),
            args.length,
            loc,
        );
        if (env.callDepth >= env.recursionLimit) {
            throw makeError(
                ErrorCode.RecursionLimit,
                { limit: env.recursionLimit, name: callable.name },
                loc,
            );
        }

        const frame = env.pushFrame(
            callable.name,
            callable.loc.file,
            callable.loc.line,
            owner,
        );
        this.onStepEnter(callable.name, callable.loc);
        try {
            callable.expects.forEach((param, i) => {
                if (param.type) {
                    env.declareVariable(param.name, param.type);
                    env.setVariable(param.name, args[i], loc);
                } else {
                    env.defineLocal(param.name, args[i]);
                }
            });
            for (const declaration of callable.declarations) {
                if (frame.main.has(declaration.name)) continue;
                env.declareVariable(
                    declaration.name,
                    declaration.type,
                    declaration.fixed,
                );
            }

            const outcome = await this.executeBlock(callable.body);
            if (outcome.kind === "exit") return returned(NOTHING);
            if (outcome.kind === "normal") {
                const declared = callable.returns
                    ? frame.lookup(callable.returns.name)
                    : undefined;
                return returned(declared ? declared.value : NOTHING);
            }
            return outcome;
        } finally {
            env.popFrame();
            this.onStepExit(callable.name);
        }
    }

    private checkArgumentCount(
        name: string,
        params: string[],
        actual: number,
        loc?: SourceLocation,
    ) {
        if (params.length === actual) return;
        throw makeError(
            ErrorCode.ArgumentCount,
            {
                name,
                expected: params.length,
                actual,
                params: params.length > 0 ? params.join(", ") : "(none)",
            },
            loc,
        );
    }

    // Expressions

    public async evaluateExpression(expr: Expression): Promise<StepsValue> {
        try {
            return await this.evaluate(expr);
        } catch (e) {
            if (e instanceof StepsError) throw e.locate(expr.loc);
            throw e;
        }
    }

    private async evaluate(expr: Expression): Promise<StepsValue> {
        switch (expr.type) {
            case "NumberLiteral":
                return number(expr.value);
            case "TextLiteral":
                return text(expr.value);
            case "BooleanLiteral":
                return boolean(expr.value);
            case "NothingLiteral":
                return NOTHING;
            case "InputExpression":
                return text(await this.environment.inputHandler(""));
            case "Identifier":
                return this.environment.getVariable(expr.name, expr.loc);

            case "ListLiteral": {
                const items: StepsValue[] = [];
                for (const element of expr.elements) {
                    items.push(await this.evaluateExpression(element));
                }
                return list(items);
            }
            case "TableLiteral": {
                const entries: [string, StepsValue][] = [];
                for (const entry of expr.entries) {
                    const key = asText(await this.evaluateExpression(entry.key));
                    entries.push([
                        key.value,
                        await this.evaluateExpression(entry.value),
                    ]);
                }
                return table(entries);
            }

            case "BinaryExpression": {
                const operator = expr.operator;
                const left = await this.evaluateExpression(expr.left);
                switch (operator) {
                    case "and":
                        if (!isTruthy(left)) return boolean(false);
                        return boolean(
                            isTruthy(await this.evaluateExpression(expr.right)),
                        );
                    case "or":
                        if (isTruthy(left)) return boolean(true);
                        return boolean(
                            isTruthy(await this.evaluateExpression(expr.right)),
                        );
                }
                const right = await this.evaluateExpression(expr.right);
                switch (operator) {
                    case "==":
                        return boolean(valuesEqual(left, right));
                    case "!=":
                        return boolean(!valuesEqual(left, right));
                    case "<":
                    case ">":
                    case "<=":
                    case ">=":
                        return compare(operator, left, right);
                    default:
                        return arithmetic(operator, left, right);
                }
            }
            case "UnaryExpression": {
                const operand = await this.evaluateExpression(expr.operand);
                return expr.operator === "-"
                    ? negate(operand)
                    : boolean(!isTruthy(operand));
            }

            case "TypeConversion":
                return convert(
                    await this.evaluateExpression(expr.value),
                    expr.target,
                );
            case "DecimalFormat": {
                const value = await this.evaluateExpression(expr.value);
                const places = asNumber(await this.evaluateExpression(expr.places));
                return formatDecimal(value, places.value);
            }
            case "TypeCheck":
                return isType(
                    await this.evaluateExpression(expr.value),
                    expr.checkType,
                );
            case "TableAccess": {
                const target = await this.evaluateExpression(expr.target);
                const key = await this.evaluateExpression(expr.key);
                return indexValue(target, key);
            }
            case "LengthOf":
                return lengthOf(await this.evaluateExpression(expr.value));
            case "CharacterAt": {
                const index = await this.evaluateExpression(expr.index);
                const source = await this.evaluateExpression(expr.source);
                return characterAt(index, source);
            }
            case "TypeOf":
                return typeOf(await this.evaluateExpression(expr.value));

            case "WordExpression": {
                const left = await this.evaluateExpression(expr.left);
                const right = await this.evaluateExpression(expr.right);
                switch (expr.operator) {
                    case "AddedTo":
                        return addedTo(left, right);
                    case "SplitBy":
                        return splitBy(left, right);
                    case "Contains":
                        return contains(left, right);
                    case "StartsWith":
                        return startsWith(left, right);
                    case "EndsWith":
                        return endsWith(left, right);
                    case "IsIn":
                        return isIn(left, right);
                }
            }
        }
    }

    // Helpers

    private requireList(name: string, action: string) {
        const value = this.environment.getVariable(name);
        if (value.type !== "list") {
            throw new StepsTypeError({
                code: ErrorCode.InvalidOperation,
                message: `Cannot ${action} '${name}' because it is a ${value.type}, not a list.`,
                hint: `Create it as a list first, like 'set ${name} to []'.`,
            });
        }
        return value.value;
    }

    private emit(line: string) {
        this.output.push(line);
        this.environment.outputHandler(line);
    }

    private toStepsError(e: unknown, loc?: SourceLocation): StepsError {
        if (e instanceof StepsError) return e.locate(loc);
        const details = e instanceof Error ? e.message : String(e);
        return makeError(ErrorCode.Internal, { details }, loc);
    }

    private toResult(outcome: Outcome): ExecutionResult {
        const output = this.output;
        switch (outcome.kind) {
            case "normal":
            case "exit":
                return { success: true, returnValue: NOTHING, output };
            case "return":
                return { success: true, returnValue: outcome.value, output };
            case "error":
                return {
                    success: false,
                    returnValue: NOTHING,
                    error: outcome.error,
                    output,
                };
            case "halt":
                return { success: false, returnValue: NOTHING, output };
        }
    }
}
