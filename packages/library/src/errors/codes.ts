export enum ErrorCode {
    // Structure
    MissingBuilding = "E001",
    MissingFloor = "E002",
    StepFloorMismatch = "E003",
    MissingStepFile = "E004",

    // Lexer
    UnexpectedCharacter = "E101",
    BadIndentation = "E102",
    TabCharacter = "E103",
    UnterminatedString = "E104",
    InconsistentIndentation = "E105",

    // Parser
    ExpectedName = "E201",
    ExpectedColon = "E202",
    ExpectedNewline = "E203",
    ExpectedIndent = "E204",
    ExpectedExpression = "E205",
    MissingDo = "E206",
    UnexpectedToken = "E207",
    WrongKeyword = "E208",

    // Types
    FixedTypeMismatch = "E301",
    InvalidOperation = "E302",
    NotIterable = "E303",
    InvalidComparison = "E304",
    ConversionFailed = "E305",

    // Runtime
    UndefinedVariable = "E401",
    UndefinedStep = "E402",
    FixedReassignment = "E403",
    DivisionByZero = "E404",
    StepInRepl = "E405",
    IndexOutOfBounds = "E406",
    KeyNotFound = "E407",
    RecursionLimit = "E408",
    ArgumentCount = "E409",
    IterationLimit = "E410",
    Internal = "E411",
}

export interface ErrorTemplate {
    message: string;
    hint: string;
}

export const ERROR_TEMPLATES: Record<ErrorCode, ErrorTemplate> = {
    [ErrorCode.MissingBuilding]: {
        message: "No .building file found in project directory.",
        hint: "Every Steps project needs a .building file as its entry point.\nCreate a file named '{expected}' in the project root.",
    },
    [ErrorCode.MissingFloor]: {
        message: "Found step files but no floor definition in '{floor}/'.",
        hint: "Every floor folder needs a .floor file listing its steps.\nCreate '{floor}.floor' to declare the steps in this floor.",
    },
    [ErrorCode.StepFloorMismatch]: {
        message: "Step '{step}' says it belongs to '{expected}', but it's in the '{actual}' floor.",
        hint: "Add or fix the line 'belongs to: {actual}' in this step.",
    },
    [ErrorCode.MissingStepFile]: {
        message: "Step '{step}' is listed in floor but file '{step}.step' not found.",
        hint: "Either create the file '{step}.step' or remove 'step: {step}' from the floor.",
    },

    [ErrorCode.UnexpectedCharacter]: {
        message: "Unexpected character '{char}'. Steps doesn't use this symbol.",
        hint: "Check for typos or unsupported characters.",
    },
    [ErrorCode.BadIndentation]: {
        message: "Indentation must use exactly 4 spaces per level. Found {spaces} spaces.",
        hint: "Use 4 spaces for each level of indentation.",
    },
    [ErrorCode.TabCharacter]: {
        message: "Found a tab character. Steps uses 4 spaces for indentation, not tabs.",
        hint: "Configure your editor to insert spaces instead of tabs.",
    },
    [ErrorCode.UnterminatedString]: {
        message: "String starting here was never closed.",
        hint: 'Add a closing " at the end of your string.',
    },
    [ErrorCode.InconsistentIndentation]: {
        message: "This line's indentation ({spaces} spaces) doesn't match any previous level.",
        hint: "The current indentation levels are: {levels}",
    },

    [ErrorCode.ExpectedName]: {
        message: "Expected a name here, but found '{found}'.",
        hint: "Names must start with a letter or underscore.",
    },
    [ErrorCode.ExpectedColon]: {
        message: "Expected ':' after '{keyword}'.",
        hint: "Add a colon: {keyword}:",
    },
    [ErrorCode.ExpectedNewline]: {
        message: "Expected end of line after '{statement}'.",
        hint: "Put each statement on its own line.",
    },
    [ErrorCode.ExpectedIndent]: {
        message: "Expected indented code after '{keyword}'.",
        hint: "Indent the code that should be inside this block by 4 spaces.",
    },
    [ErrorCode.ExpectedExpression]: {
        message: "Expected a value here (number, text, or variable name), but found '{found}'.",
        hint: 'Examples: 42, "hello", my_variable',
    },
    [ErrorCode.MissingDo]: {
        message: "Step '{step}' needs a 'do:' section with its logic.",
        hint: "Add 'do:' followed by the indented body of the step.",
    },
    [ErrorCode.UnexpectedToken]: {
        message: "Unexpected '{token}' here.",
        hint: "Check the syntax of your statement.",
    },
    [ErrorCode.WrongKeyword]: {
        message: "Steps uses '{correct}' instead of '{found}'.",
        hint: "Try: {correct}",
    },

    [ErrorCode.FixedTypeMismatch]: {
        message: "Cannot assign {actual} to '{name}' - it was declared as {declared}.",
        hint: "Assign a {declared} value, or convert it first with 'as {declared}'.",
    },
    [ErrorCode.InvalidOperation]: {
        message: "Cannot {operation} with {left} and {right}.",
        hint: "Check that the types are compatible for this operation.",
    },
    [ErrorCode.NotIterable]: {
        message: "Cannot iterate over a {type}. 'repeat for each' needs a list, text or table.",
        hint: "Example: repeat for each item in [1, 2, 3]",
    },
    [ErrorCode.InvalidComparison]: {
        message: "Cannot compare {left} and {right} with '{operator}'.",
        hint: "This comparison only works with numbers.",
    },
    [ErrorCode.ConversionFailed]: {
        message: 'Could not convert "{value}" to {target}.',
        hint: "Use 'attempt:' to handle values that may not convert.",
    },

    [ErrorCode.UndefinedVariable]: {
        message: "Variable '{name}' has not been defined yet.",
        hint: "Define it first with 'set {name} to ...' or declare it in 'declare:'.",
    },
    [ErrorCode.UndefinedStep]: {
        message: "Step '{name}' does not exist.",
        hint: "Available steps: {available}",
    },
    [ErrorCode.FixedReassignment]: {
        message: "Cannot change '{name}' because it was declared as 'fixed'.",
        hint: "Fixed variables cannot be reassigned after their initial value is set.",
    },
    [ErrorCode.DivisionByZero]: {
        message: "Cannot divide by zero.",
        hint: "Check that your divisor is not zero before dividing.",
    },
    [ErrorCode.StepInRepl]: {
        message: "Cannot call step '{name}' here.",
        hint: "The REPL cannot define steps. Create a project to use steps.",
    },
    [ErrorCode.IndexOutOfBounds]: {
        message: "Index {index} is out of bounds for {container} of length {length}.",
        hint: "Valid indices are 0 to {max}.",
    },
    [ErrorCode.KeyNotFound]: {
        message: 'Key "{key}" not found in table.',
        hint: "Available keys: {available}",
    },
    [ErrorCode.RecursionLimit]: {
        message: "Maximum recursion depth ({limit}) exceeded when calling '{name}'.",
        hint: "Your step is calling itself too many times. Check for infinite recursion.",
    },
    [ErrorCode.ArgumentCount]: {
        message: "Step '{name}' expects {expected} argument(s), got {actual}.",
        hint: "Expected parameters: {params}",
    },
    [ErrorCode.IterationLimit]: {
        message: "Maximum loop iterations exceeded ({limit}).",
        hint: "Your loop may be infinite. Check the condition.",
    },
    [ErrorCode.Internal]: {
        message: "Internal error: {details}",
        hint: "This is likely a bug in the Steps interpreter.",
    },
};

const KNOWN_CODES = new Set<string>(Object.values(ErrorCode));

export function isErrorCode(code: string): code is ErrorCode {
    return KNOWN_CODES.has(code);
}
