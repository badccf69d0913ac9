import {
    ErrorCode,
    ErrorParams,
    SourceLocation,
    StepsError,
    StructureError,
    ValueType,
    isValueType,
    makeError,
} from "@stepslang/library";
import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { tokenize } from "../lexer/Lexer";
import { ParseResult } from "./types";
import {
    BinaryOperator,
    Expression,
    TableLiteral,
    WordOperator,
} from "./expressions";
import {
    Statement,
    SetStatement,
    SetIndexStatement,
    CallStatement,
    IfStatement,
    ConditionalBranch,
    RepeatTimesStatement,
    RepeatForEachStatement,
    RepeatWhileStatement,
    AttemptStatement,
} from "./statements";
import {
    BuildingNode,
    Declaration,
    FloorNode,
    Parameter,
    ReturnDeclaration,
    RiserNode,
    StepNode,
} from "./structure";

const COMPARISONS: Partial<Record<TokenType, BinaryOperator>> = {
    [TokenType.IsEqualTo]: "==",
    [TokenType.Equals]: "==",
    [TokenType.IsNotEqualTo]: "!=",
    [TokenType.IsLessThan]: "<",
    [TokenType.IsGreaterThan]: ">",
    [TokenType.IsLessThanOrEqualTo]: "<=",
    [TokenType.IsGreaterThanOrEqualTo]: ">=",
};

const WORD_COMPARISONS: Partial<Record<TokenType, WordOperator>> = {
    [TokenType.IsIn]: "IsIn",
    [TokenType.Contains]: "Contains",
    [TokenType.StartsWith]: "StartsWith",
    [TokenType.EndsWith]: "EndsWith",
};

/** Keywords from other languages mapped to their Steps spelling. */
const WRONG_KEYWORDS = new Map<string, string>([
    ["else", "otherwise"],
    ["elif", "otherwise if"],
    ["elseif", "otherwise if"],
    ["print", "display"],
    ["let", "set"],
    ["var", "set"],
    ["for", "repeat for each"],
    ["def", "step:"],
    ["function", "step:"],
    ["try", "attempt:"],
    ["catch", "if unsuccessful:"],
    ["finally", "then continue:"],
]);

export class Parser {
    private tokens: Token[];
    private file: string;
    private current: number = 0;
    private errors: StepsError[] = [];

    constructor(tokens: Token[], file: string = "<string>") {
        this.tokens = tokens;
        this.file = file;
    }

    public parseBuilding(): ParseResult<BuildingNode> {
        return this.run(() => {
            this.skipNewlines();
            const start = this.expectHeader(
                TokenType.Building,
                "A building file starts with 'building: <name>'.",
            );
            const name = this.consumeName();
            const body = this.block("building:");
            this.expectEnd();
            return new BuildingNode(name.value, body, this.getLoc(start));
        });
    }

    public parseFloor(): ParseResult<FloorNode> {
        return this.run(() => {
            this.skipNewlines();
            const start = this.expectHeader(
                TokenType.Floor,
                "A floor file starts with 'floor: <name>'.",
            );
            const name = this.consumeName();
            this.openBlock("floor:");

            const steps: string[] = [];
            while (!this.check(TokenType.Dedent, TokenType.EOF)) {
                if (this.match(TokenType.Newline)) continue;
                try {
                    this.consume(TokenType.Step, ErrorCode.UnexpectedToken, {
                        token: this.describe(this.peek()),
                    });
                    this.consumeColon("step");
                    steps.push(this.consumeName().value);
                    this.endOfLine("step");
                } catch (e) {
                    this.recover(e);
                }
            }
            this.match(TokenType.Dedent);
            this.expectEnd();
            return new FloorNode(name.value, steps, this.getLoc(start));
        });
    }

    public parseStep(): ParseResult<StepNode> {
        return this.run(() => {
            this.skipNewlines();
            const start = this.expectHeader(
                TokenType.Step,
                "A step file starts with 'step: <name>'.",
            );
            const name = this.consumeName();
            this.openBlock("step:");

            let belongsTo: string | null = null;
            const risers: RiserNode[] = [];
            const callable = this.callableSections(
                `step '${name.value}'`,
                () => {
                    if (this.match(TokenType.BelongsTo)) {
                        this.consumeColon("belongs to");
                        belongsTo = this.consumeName().value;
                        this.endOfLine("belongs to");
                        return true;
                    }
                    if (this.match(TokenType.Riser)) {
                        risers.push(this.riser());
                        return true;
                    }
                    return false;
                },
            );
            this.expectEnd();

            const loc = this.getLoc(start);
            if (belongsTo === null) {
                this.errors.push(
                    new StructureError({
                        code: ErrorCode.StepFloorMismatch,
                        message: `Step '${name.value}' does not say which floor it belongs to.`,
                        hint: "Add 'belongs to: <floor name>' at the top of the step.",
                        file: this.file,
                        line: loc.line,
                        column: loc.col,
                    }),
                );
            }
            if (!callable.hasDo) {
                this.errors.push(
                    makeError(ErrorCode.MissingDo, { step: name.value }, loc),
                );
            }

            return new StepNode(
                name.value,
                belongsTo,
                callable.expects,
                callable.returns,
                risers,
                callable.declarations,
                callable.body,
                loc,
            );
        });
    }

    /**
     * Parses a bare sequence of statements, as typed into a REPL.
     */
    public parseReplStatements(): ParseResult<Statement[]> {
        return this.run(() => {
            const statements: Statement[] = [];
            while (!this.isAtEnd()) {
                if (this.match(TokenType.Newline)) continue;
                if (this.check(TokenType.Dedent)) {
                    this.advance();
                    continue;
                }
                if (this.check(TokenType.Indent)) {
                    this.recover(
                        this.error(ErrorCode.UnexpectedToken, {
                            token: this.describe(this.peek()),
                        }),
                    );
                    continue;
                }
                const statement = this.statement();
                if (statement) statements.push(statement);
            }
            return statements;
        });
    }

    private run<T>(parse: () => T): ParseResult<T> {
        this.current = 0;
        this.errors = [];
        try {
            const ast = parse();
            return { ast, errors: this.errors };
        } catch (e) {
            if (!(e instanceof StepsError)) throw e;
            this.errors.push(e);
            return { ast: null, errors: this.errors };
        }
    }

    private expectHeader(type: TokenType, hint: string): Token {
        if (!this.check(type)) {
            throw makeError(
                ErrorCode.UnexpectedToken,
                { token: this.describe(this.peek()) },
                this.getLoc(this.peek()),
                hint,
            );
        }
        const token = this.advance();
        this.consumeColon(token.value);
        return token;
    }

    private expectEnd() {
        this.skipNewlines();
        if (!this.isAtEnd()) {
            throw this.error(ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
        }
    }

    // Step and riser sections

    private callableSections(
        owner: string,
        extra: () => boolean,
    ): {
        expects: Parameter[];
        returns: ReturnDeclaration | null;
        declarations: Declaration[];
        body: Statement[];
        hasDo: boolean;
    } {
        let expects: Parameter[] = [];
        let returns: ReturnDeclaration | null = null;
        let declarations: Declaration[] = [];
        let body: Statement[] = [];
        let hasDo = false;

        while (!this.check(TokenType.Dedent, TokenType.EOF)) {
            if (this.match(TokenType.Newline)) continue;
            try {
                if (this.match(TokenType.Expects)) {
                    this.consumeColon("expects");
                    expects = this.parameters();
                    this.endOfLine("expects");
                } else if (this.match(TokenType.Returns)) {
                    this.consumeColon("returns");
                    returns = this.returnDeclaration();
                    this.endOfLine("returns");
                } else if (this.match(TokenType.Declare)) {
                    this.consumeColon("declare");
                    declarations = this.declarations();
                } else if (this.match(TokenType.Do)) {
                    this.consumeColon("do");
                    body = this.block("do:");
                    hasDo = true;
                } else if (!extra()) {
                    throw makeError(
                        ErrorCode.UnexpectedToken,
                        { token: this.describe(this.peek()) },
                        this.getLoc(this.peek()),
                        `Sections of ${owner} are 'expects:', 'returns:', 'declare:' and 'do:'.`,
                    );
                }
            } catch (e) {
                this.recover(e);
            }
        }
        this.match(TokenType.Dedent);
        return { expects, returns, declarations, body, hasDo };
    }

    private riser(): RiserNode {
        const start = this.previous();
        this.consumeColon("riser");
        const name = this.consumeName();
        this.openBlock("riser:");
        const sections = this.callableSections(
            `riser '${name.value}'`,
            () => false,
        );
        if (!sections.hasDo) {
            this.errors.push(
                makeError(
                    ErrorCode.MissingDo,
                    { step: name.value },
                    this.getLoc(start),
                ),
            );
        }
        return new RiserNode(
            name.value,
            sections.expects,
            sections.returns,
            sections.declarations,
            sections.body,
            this.getLoc(start),
        );
    }

    private parameters(): Parameter[] {
        const params: Parameter[] = [];
        if (this.match(TokenType.Nothing)) return params;

        do {
            const name = this.consumeName();
            const type = this.match(TokenType.As) ? this.typeName() : null;
            params.push({ name: name.value, type, loc: this.getLoc(name) });
        } while (this.match(TokenType.Comma));
        return params;
    }

    private returnDeclaration(): ReturnDeclaration | null {
        if (this.match(TokenType.Nothing)) return null;
        const name = this.consumeName();
        const type = this.match(TokenType.As) ? this.typeName() : null;
        return { name: name.value, type, loc: this.getLoc(name) };
    }

    private declarations(): Declaration[] {
        const declarations: Declaration[] = [];
        this.openBlock("declare:");
        while (!this.check(TokenType.Dedent, TokenType.EOF)) {
            if (this.match(TokenType.Newline)) continue;
            try {
                const name = this.consumeName();
                this.consume(TokenType.As, ErrorCode.UnexpectedToken, {
                    token: this.describe(this.peek()),
                });
                const type = this.typeName();
                const fixed = this.match(TokenType.Fixed);
                declarations.push({
                    name: name.value,
                    type,
                    fixed,
                    loc: this.getLoc(name),
                });
                this.endOfLine("declaration");
            } catch (e) {
                this.recover(e);
            }
        }
        this.match(TokenType.Dedent);
        return declarations;
    }

    private typeName(): ValueType {
        const token = this.consume(TokenType.TypeName, ErrorCode.UnexpectedToken, {
            token: this.describe(this.peek()),
        });
        if (!isValueType(token.value)) {
            throw this.error(ErrorCode.UnexpectedToken, { token: token.value });
        }
        return token.value;
    }

    // Blocks and statements

    private openBlock(keyword: string) {
        this.endOfLine(keyword);
        this.skipNewlines();
        this.consume(TokenType.Indent, ErrorCode.ExpectedIndent, { keyword });
    }

    /** Parses NEWLINE INDENT statements DEDENT. */
    private block(keyword: string): Statement[] {
        this.openBlock(keyword);
        const statements: Statement[] = [];
        while (!this.check(TokenType.Dedent, TokenType.EOF)) {
            if (this.match(TokenType.Newline)) continue;
            const statement = this.statement();
            if (statement) statements.push(statement);
        }
        this.match(TokenType.Dedent);
        return statements;
    }

    private statement(): Statement | null {
        try {
            return this.statementInner();
        } catch (e) {
            this.recover(e);
            return null;
        }
    }

    private statementInner(): Statement {
        const token = this.peek();

        if (this.match(TokenType.Display)) {
            const value = this.expression();
            this.endOfLine("display");
            return {
                kind: "DisplayStatement",
                value,
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.Set)) return this.setStatement(token);
        if (this.match(TokenType.Call)) return this.callStatement(token);
        if (this.match(TokenType.Return)) {
            const value = this.check(
                TokenType.Newline,
                TokenType.Dedent,
                TokenType.EOF,
            )
                ? undefined
                : this.expression();
            this.endOfLine("return");
            return { kind: "ReturnStatement", value, loc: this.getLoc(token) };
        }
        if (this.match(TokenType.Exit)) {
            this.endOfLine("exit");
            return { kind: "ExitStatement", loc: this.getLoc(token) };
        }
        if (this.match(TokenType.If)) return this.ifStatement(token);
        if (this.match(TokenType.Repeat)) return this.repeatStatement(token);
        if (this.match(TokenType.Attempt)) return this.attemptStatement(token);
        if (this.match(TokenType.Add)) {
            const item = this.expression();
            this.consume(TokenType.To, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            const listName = this.consumeName().value;
            this.endOfLine("add");
            return {
                kind: "AddToListStatement",
                item,
                listName,
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.Remove)) {
            const item = this.expression();
            this.consume(TokenType.From, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            const listName = this.consumeName().value;
            this.endOfLine("remove");
            return {
                kind: "RemoveFromListStatement",
                item,
                listName,
                loc: this.getLoc(token),
            };
        }

        const correct = this.check(TokenType.Identifier)
            ? WRONG_KEYWORDS.get(token.value)
            : undefined;
        if (correct !== undefined) {
            throw this.error(ErrorCode.WrongKeyword, {
                correct,
                found: token.value,
            });
        }
        if (this.check(TokenType.While)) {
            throw this.error(ErrorCode.WrongKeyword, {
                correct: "repeat while",
                found: "while",
            });
        }
        throw this.error(ErrorCode.UnexpectedToken, {
            token: this.describe(token),
        });
    }

    private setStatement(start: Token): SetStatement | SetIndexStatement {
        const target = this.consumeName().value;
        if (this.match(TokenType.LBracket)) {
            const index = this.expression();
            this.consume(TokenType.RBracket, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            this.consume(TokenType.To, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            const value = this.expression();
            this.endOfLine("set");
            return new SetIndexStatement(
                target,
                index,
                value,
                this.getLoc(start),
            );
        }
        this.consume(TokenType.To, ErrorCode.UnexpectedToken, {
            token: this.describe(this.peek()),
        });
        const value = this.expression();
        this.endOfLine("set");
        return new SetStatement(target, value, this.getLoc(start));
    }

    private callStatement(start: Token): CallStatement {
        const name = this.consumeName().value;
        const args: Expression[] = [];
        if (this.match(TokenType.With)) {
            do {
                args.push(this.expression());
            } while (this.match(TokenType.Comma));
        }
        let resultTarget: string | null = null;
        if (this.match(TokenType.StoringResultIn)) {
            resultTarget = this.consumeName().value;
        }
        this.endOfLine("call");
        return new CallStatement(name, args, resultTarget, this.getLoc(start));
    }

    private ifStatement(start: Token): IfStatement {
        const branch = this.conditionalBranch(start, "if");
        const otherwiseIfs: ConditionalBranch[] = [];
        while (this.check(TokenType.OtherwiseIf)) {
            const token = this.advance();
            otherwiseIfs.push(this.conditionalBranch(token, "otherwise if"));
        }
        let otherwise: Statement[] | null = null;
        if (this.match(TokenType.Otherwise)) {
            this.match(TokenType.Colon);
            otherwise = this.block("otherwise");
        }
        return new IfStatement(
            branch,
            otherwiseIfs,
            otherwise,
            this.getLoc(start),
        );
    }

    private conditionalBranch(start: Token, keyword: string): ConditionalBranch {
        const condition = this.expression();
        this.match(TokenType.Colon);
        const body = this.block(keyword);
        return { condition, body, loc: this.getLoc(start) };
    }

    private repeatStatement(
        start: Token,
    ): RepeatTimesStatement | RepeatForEachStatement | RepeatWhileStatement {
        const loc = this.getLoc(start);
        if (this.match(TokenType.ForEach)) {
            const item = this.consumeName().value;
            this.consume(TokenType.In, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            const collection = this.expression();
            this.match(TokenType.Colon);
            const body = this.block("repeat for each");
            return new RepeatForEachStatement(item, collection, body, loc);
        }
        if (this.match(TokenType.While)) {
            const condition = this.expression();
            this.match(TokenType.Colon);
            const body = this.block("repeat while");
            return new RepeatWhileStatement(condition, body, loc);
        }
        const count = this.expression();
        this.consume(TokenType.Times, ErrorCode.UnexpectedToken, {
            token: this.describe(this.peek()),
        });
        this.match(TokenType.Colon);
        const body = this.block("repeat times");
        return new RepeatTimesStatement(count, body, loc);
    }

    private attemptStatement(start: Token): AttemptStatement {
        this.consumeColon("attempt");
        const body = this.block("attempt:");
        let unsuccessful: Statement[] | null = null;
        let thenContinue: Statement[] | null = null;
        if (this.match(TokenType.IfUnsuccessful)) {
            this.consumeColon("if unsuccessful");
            unsuccessful = this.block("if unsuccessful:");
        }
        if (this.match(TokenType.ThenContinue)) {
            this.consumeColon("then continue");
            thenContinue = this.block("then continue:");
        }
        return new AttemptStatement(
            body,
            unsuccessful,
            thenContinue,
            this.getLoc(start),
        );
    }

    // Expressions, lowest precedence first

    private expression(): Expression {
        return this.or();
    }

    private or(): Expression {
        let expr = this.and();
        while (this.match(TokenType.Or)) {
            const right = this.and();
            expr = this.binary("or", expr, right);
        }
        return expr;
    }

    private and(): Expression {
        let expr = this.not();
        while (this.match(TokenType.And)) {
            const right = this.not();
            expr = this.binary("and", expr, right);
        }
        return expr;
    }

    private not(): Expression {
        if (this.match(TokenType.Not)) {
            const start = this.previous();
            const operand = this.not();
            return {
                type: "UnaryExpression",
                operator: "not",
                operand,
                loc: this.mergeLoc(this.getLoc(start), operand.loc),
            };
        }
        return this.comparison();
    }

    private comparison(): Expression {
        const left = this.term();
        const token = this.peek();

        if (this.match(TokenType.IsA)) {
            if (!isValueType(token.value)) {
                throw this.error(ErrorCode.UnexpectedToken, {
                    token: token.value,
                });
            }
            return {
                type: "TypeCheck",
                value: left,
                checkType: token.value,
                loc: this.mergeLoc(left.loc, this.getLoc(token)),
            };
        }

        const operator = COMPARISONS[token.type];
        if (operator) {
            this.advance();
            return this.binary(operator, left, this.term());
        }

        const word = WORD_COMPARISONS[token.type];
        if (word) {
            this.advance();
            return this.word(word, left, this.term());
        }
        return left;
    }

    private term(): Expression {
        let expr = this.factor();
        while (true) {
            if (this.match(TokenType.PlusOp, TokenType.MinusOp)) {
                const operator = this.previous().value === "+" ? "+" : "-";
                expr = this.binary(operator, expr, this.factor());
            } else if (this.match(TokenType.AddedTo)) {
                expr = this.word("AddedTo", expr, this.factor());
            } else if (this.match(TokenType.SplitBy)) {
                expr = this.word("SplitBy", expr, this.factor());
            } else {
                return expr;
            }
        }
    }

    private factor(): Expression {
        let expr = this.unary();
        while (
            this.match(
                TokenType.MultiplyOp,
                TokenType.DivideOp,
                TokenType.PercentOp,
                TokenType.Modulo,
            )
        ) {
            const type = this.previous().type;
            const operator =
                type === TokenType.MultiplyOp
                    ? "*"
                    : type === TokenType.DivideOp
                      ? "/"
                      : "%";
            expr = this.binary(operator, expr, this.unary());
        }
        return expr;
    }

    private unary(): Expression {
        const start = this.peek();
        if (this.match(TokenType.MinusOp)) {
            const operand = this.unary();
            return {
                type: "UnaryExpression",
                operator: "-",
                operand,
                loc: this.mergeLoc(this.getLoc(start), operand.loc),
            };
        }
        if (this.match(TokenType.LengthOf)) {
            const value = this.unary();
            return {
                type: "LengthOf",
                value,
                loc: this.mergeLoc(this.getLoc(start), value.loc),
            };
        }
        if (this.match(TokenType.TypeOf)) {
            const value = this.unary();
            return {
                type: "TypeOf",
                value,
                loc: this.mergeLoc(this.getLoc(start), value.loc),
            };
        }
        if (this.match(TokenType.CharacterAt)) {
            const index = this.postfix();
            this.consume(TokenType.Of, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            const source = this.unary();
            return {
                type: "CharacterAt",
                index,
                source,
                loc: this.mergeLoc(this.getLoc(start), source.loc),
            };
        }
        return this.postfix();
    }

    private postfix(): Expression {
        let expr = this.primary();
        while (true) {
            if (this.match(TokenType.LBracket)) {
                const key = this.expression();
                const end = this.consume(
                    TokenType.RBracket,
                    ErrorCode.UnexpectedToken,
                    { token: this.describe(this.peek()) },
                );
                expr = {
                    type: "TableAccess",
                    target: expr,
                    key,
                    loc: this.mergeLoc(expr.loc, this.getLoc(end)),
                };
            } else if (this.match(TokenType.As)) {
                // `decimal` is only a keyword directly after `as`
                if (this.checkWord("decimal")) {
                    this.advance();
                    this.consume(TokenType.LParen, ErrorCode.UnexpectedToken, {
                        token: this.describe(this.peek()),
                    });
                    const places = this.expression();
                    const end = this.consume(
                        TokenType.RParen,
                        ErrorCode.UnexpectedToken,
                        { token: this.describe(this.peek()) },
                    );
                    expr = {
                        type: "DecimalFormat",
                        value: expr,
                        places,
                        loc: this.mergeLoc(expr.loc, this.getLoc(end)),
                    };
                } else {
                    const target = this.typeName();
                    expr = {
                        type: "TypeConversion",
                        value: expr,
                        target,
                        loc: this.mergeLoc(
                            expr.loc,
                            this.getLoc(this.previous()),
                        ),
                    };
                }
            } else {
                return expr;
            }
        }
    }

    private primary(): Expression {
        const token = this.peek();
        const loc = this.getLoc(token);

        if (this.match(TokenType.NumberLiteral)) {
            return { type: "NumberLiteral", value: parseFloat(token.value), loc };
        }
        if (this.match(TokenType.TextLiteral)) {
            return { type: "TextLiteral", value: token.value, loc };
        }
        if (this.match(TokenType.True, TokenType.False)) {
            return {
                type: "BooleanLiteral",
                value: token.type === TokenType.True,
                loc,
            };
        }
        if (this.match(TokenType.Nothing)) {
            return { type: "NothingLiteral", loc };
        }
        if (this.match(TokenType.Input)) {
            return { type: "InputExpression", loc };
        }
        if (this.match(TokenType.Identifier)) {
            return { type: "Identifier", name: token.value, loc };
        }
        if (this.match(TokenType.LBracket)) {
            return this.collectionLiteral(token);
        }
        if (this.match(TokenType.LParen)) {
            const expr = this.expression();
            this.consume(TokenType.RParen, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            return expr;
        }

        throw this.error(ErrorCode.ExpectedExpression, {
            found: this.describe(token),
        });
    }

    /** `[a, b]`, `[k: v, ...]`, `[]` or `[:]` */
    private collectionLiteral(start: Token): Expression {
        if (this.match(TokenType.RBracket)) {
            return {
                type: "ListLiteral",
                elements: [],
                loc: this.mergeLoc(this.getLoc(start), this.getLoc(this.previous())),
            };
        }
        if (this.match(TokenType.Colon)) {
            const end = this.consume(TokenType.RBracket, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            return {
                type: "TableLiteral",
                entries: [],
                loc: this.mergeLoc(this.getLoc(start), this.getLoc(end)),
            };
        }

        const first = this.expression();
        if (this.match(TokenType.Colon)) {
            const entries: TableLiteral["entries"] = [
                { key: first, value: this.expression() },
            ];
            while (this.match(TokenType.Comma)) {
                const key = this.expression();
                this.consume(TokenType.Colon, ErrorCode.ExpectedColon, {
                    keyword: "table key",
                });
                entries.push({ key, value: this.expression() });
            }
            const end = this.consume(TokenType.RBracket, ErrorCode.UnexpectedToken, {
                token: this.describe(this.peek()),
            });
            return {
                type: "TableLiteral",
                entries,
                loc: this.mergeLoc(this.getLoc(start), this.getLoc(end)),
            };
        }

        const elements = [first];
        while (this.match(TokenType.Comma)) {
            elements.push(this.expression());
        }
        const end = this.consume(TokenType.RBracket, ErrorCode.UnexpectedToken, {
            token: this.describe(this.peek()),
        });
        return {
            type: "ListLiteral",
            elements,
            loc: this.mergeLoc(this.getLoc(start), this.getLoc(end)),
        };
    }

    private binary(
        operator: BinaryOperator,
        left: Expression,
        right: Expression,
    ): Expression {
        return {
            type: "BinaryExpression",
            operator,
            left,
            right,
            loc: this.mergeLoc(left.loc, right.loc),
        };
    }

    private word(
        operator: WordOperator,
        left: Expression,
        right: Expression,
    ): Expression {
        return {
            type: "WordExpression",
            operator,
            left,
            right,
            loc: this.mergeLoc(left.loc, right.loc),
        };
    }

    // Recovery

    private recover(e: unknown) {
        if (!(e instanceof StepsError)) throw e;
        this.errors.push(e);
        this.synchronize();
    }

    /**
     * Skips to the start of the next statement at the same or a lower
     * indentation, including any block owned by the broken line.
     */
    private synchronize() {
        let depth = 0;
        while (!this.isAtEnd()) {
            const token = this.advance();
            if (token.type === TokenType.Indent) {
                depth++;
            } else if (token.type === TokenType.Dedent) {
                if (depth === 0) {
                    this.current--;
                    return;
                }
                depth--;
                if (depth === 0 && !this.check(TokenType.Indent)) return;
            } else if (
                token.type === TokenType.Newline &&
                depth === 0 &&
                !this.check(TokenType.Indent)
            ) {
                return;
            }
        }
    }

    // Token helpers

    private getLoc(token: Token): SourceLocation {
        const length = token.length ?? token.value.length;
        return {
            file: this.file,
            line: token.line,
            col: token.col,
            endLine: token.line,
            endCol: token.col + length,
        };
    }

    private mergeLoc(start: SourceLocation, end: SourceLocation): SourceLocation {
        return {
            file: start.file,
            line: start.line,
            col: start.col,
            endLine: end.endLine ?? end.line,
            endCol: end.endCol ?? end.col,
        };
    }

    private describe(token: Token): string {
        switch (token.type) {
            case TokenType.Newline:
                return "end of line";
            case TokenType.Indent:
                return "indentation";
            case TokenType.Dedent:
                return "end of block";
            case TokenType.EOF:
                return "end of file";
            case TokenType.TextLiteral:
                return `"${token.value}"`;
            default:
                return token.value;
        }
    }

    private skipNewlines() {
        while (this.match(TokenType.Newline));
    }

    private endOfLine(statement: string) {
        if (this.check(TokenType.Dedent, TokenType.EOF)) return;
        this.consume(TokenType.Newline, ErrorCode.ExpectedNewline, {
            statement,
        });
    }

    private consumeName(): Token {
        return this.consume(TokenType.Identifier, ErrorCode.ExpectedName, {
            found: this.describe(this.peek()),
        });
    }

    private consumeColon(keyword: string): Token {
        return this.consume(TokenType.Colon, ErrorCode.ExpectedColon, {
            keyword,
        });
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(
        type: TokenType,
        code: ErrorCode,
        params: ErrorParams,
    ): Token {
        if (this.check(type)) return this.advance();
        throw this.error(code, params);
    }

    private check(...types: TokenType[]): boolean {
        return types.includes(this.peek().type);
    }

    private checkWord(word: string): boolean {
        const token = this.peek();
        return token.type === TokenType.Identifier && token.value === word;
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private previous(): Token {
        return this.tokens[Math.max(0, this.current - 1)];
    }

    private error(code: ErrorCode, params: ErrorParams): StepsError {
        return makeError(code, params, this.getLoc(this.peek()));
    }
}

function parseWith<T>(
    source: string,
    file: string,
    parse: (parser: Parser) => ParseResult<T>,
): ParseResult<T> {
    let result: ParseResult<T>;
    try {
        result = parse(new Parser(tokenize(source, file), file));
    } catch (e) {
        if (!(e instanceof StepsError)) throw e;
        return { ast: null, errors: [e] };
    }
    for (const error of result.errors) {
        if (error.contextLines.length === 0) error.withContext(source);
    }
    return result;
}

export function parseBuilding(
    source: string,
    file: string = "<string>",
): ParseResult<BuildingNode> {
    return parseWith(source, file, (parser) => parser.parseBuilding());
}

export function parseFloor(
    source: string,
    file: string = "<string>",
): ParseResult<FloorNode> {
    return parseWith(source, file, (parser) => parser.parseFloor());
}

export function parseStep(
    source: string,
    file: string = "<string>",
): ParseResult<StepNode> {
    return parseWith(source, file, (parser) => parser.parseStep());
}

export function parseReplStatements(
    source: string,
    file: string = "<repl>",
): ParseResult<Statement[]> {
    return parseWith(source, file, (parser) => parser.parseReplStatements());
}
