import { ERROR_TEMPLATES, ErrorCode, isErrorCode } from "./codes";
import { SourceLocation } from "./location";
import {
    LexerError,
    ParseError,
    StepsError,
    StepsErrorInit,
    StepsRuntimeError,
    StepsTypeError,
    StructureError,
} from "./StepsError";

export type ErrorParams = Record<string, string | number>;

function fill(template: string, params: ErrorParams): string {
    return template.replace(/\{(\w+)\}/g, (match, key: string) =>
        key in params ? String(params[key]) : match,
    );
}

function construct(code: string, init: StepsErrorInit): StepsError {
    switch (code.charAt(1)) {
        case "0":
            return new StructureError(init);
        case "1":
            return new LexerError(init);
        case "2":
            return new ParseError(init);
        case "3":
            return new StepsTypeError(init);
        case "4":
            return new StepsRuntimeError(init);
        default:
            return new StepsError(init);
    }
}

/**
 * Builds an error from the template registered for `code`.
 * Unknown codes produce a generic but well-formed error.
 */
export function makeError(
    code: ErrorCode | string,
    params: ErrorParams = {},
    loc?: SourceLocation,
    hintOverride?: string,
): StepsError {
    const template = isErrorCode(code) ? ERROR_TEMPLATES[code] : undefined;
    const message = template
        ? fill(template.message, params)
        : `Unknown error ${code}`;
    const hint =
        hintOverride ?? (template ? fill(template.hint, params) : undefined);

    return construct(code, {
        code,
        message,
        hint,
        file: loc?.file,
        line: loc?.line,
        column: loc?.col,
    });
}

export function levenshtein(a: string, b: string): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                previous[j] + 1,
                current[j - 1] + 1,
                previous[j - 1] + cost,
            );
        }
        previous = current;
    }
    return previous[b.length];
}

/**
 * Returns the candidate closest to `name`, or undefined when nothing is
 * near enough to be a plausible typo.
 */
export function suggestName(
    name: string,
    candidates: Iterable<string>,
): string | undefined {
    const threshold = Math.max(2, Math.floor(name.length / 3));
    let best: string | undefined;
    let bestDistance = Infinity;

    for (const candidate of candidates) {
        const distance = levenshtein(name.toLowerCase(), candidate.toLowerCase());
        if (distance <= threshold && distance < bestDistance) {
            best = candidate;
            bestDistance = distance;
        }
    }
    return best;
}

export function undefinedVariableError(
    name: string,
    loc?: SourceLocation,
    candidates: Iterable<string> = [],
): StepsError {
    const suggestion = suggestName(name, candidates);
    const hint = suggestion ? `Did you mean '${suggestion}'?` : undefined;
    return makeError(ErrorCode.UndefinedVariable, { name }, loc, hint);
}

export function undefinedStepError(
    name: string,
    loc?: SourceLocation,
    available: string[] = [],
): StepsError {
    const listing = available.length > 0 ? available.join(", ") : "(none)";
    const suggestion = suggestName(name, available);
    const hint = suggestion
        ? `Did you mean '${suggestion}'?\nAvailable steps: ${listing}`
        : `Available steps: ${listing}`;
    return makeError(ErrorCode.UndefinedStep, { name }, loc, hint);
}

export function divisionByZeroError(loc?: SourceLocation): StepsError {
    return makeError(ErrorCode.DivisionByZero, {}, loc);
}

export function typeMismatchError(
    name: string,
    declared: string,
    actual: string,
    loc?: SourceLocation,
): StepsError {
    return makeError(
        ErrorCode.FixedTypeMismatch,
        { name, declared, actual },
        loc,
    );
}
