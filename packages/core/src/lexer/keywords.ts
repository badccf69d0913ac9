import { TokenType } from "./TokenType";

export const KEYWORDS: Record<string, TokenType> = {
    building: TokenType.Building,
    floor: TokenType.Floor,
    step: TokenType.Step,
    riser: TokenType.Riser,
    expects: TokenType.Expects,
    returns: TokenType.Returns,
    declare: TokenType.Declare,
    do: TokenType.Do,
    attempt: TokenType.Attempt,

    display: TokenType.Display,
    set: TokenType.Set,
    to: TokenType.To,
    call: TokenType.Call,
    with: TokenType.With,
    return: TokenType.Return,
    exit: TokenType.Exit,
    if: TokenType.If,
    otherwise: TokenType.Otherwise,
    repeat: TokenType.Repeat,
    times: TokenType.Times,
    in: TokenType.In,
    while: TokenType.While,
    add: TokenType.Add,
    remove: TokenType.Remove,
    from: TokenType.From,
    as: TokenType.As,
    fixed: TokenType.Fixed,
    input: TokenType.Input,

    and: TokenType.And,
    or: TokenType.Or,
    not: TokenType.Not,
    equals: TokenType.Equals,
    contains: TokenType.Contains,
    of: TokenType.Of,
    modulo: TokenType.Modulo,

    true: TokenType.True,
    false: TokenType.False,
    nothing: TokenType.Nothing,

    number: TokenType.TypeName,
    text: TokenType.TypeName,
    boolean: TokenType.TypeName,
    list: TokenType.TypeName,
    table: TokenType.TypeName,
};

interface Phrase {
    words: string[];
    type: TokenType;
    /** Token value; defaults to the phrase itself. */
    value?: string;
}

const TYPE_CHECKS: Phrase[] = ["number", "text", "boolean", "list", "table"].map(
    (name) => ({ words: ["is", "a", name], type: TokenType.IsA, value: name }),
);

/**
 * Multi-word keywords, longest first so that a shorter phrase never
 * shadows a longer one sharing its prefix.
 */
export const PHRASES: Phrase[] = [
    {
        words: ["is", "greater", "than", "or", "equal", "to"],
        type: TokenType.IsGreaterThanOrEqualTo,
    },
    {
        words: ["is", "less", "than", "or", "equal", "to"],
        type: TokenType.IsLessThanOrEqualTo,
    },
    { words: ["is", "not", "equal", "to"], type: TokenType.IsNotEqualTo },
    { words: ["is", "greater", "than"], type: TokenType.IsGreaterThan },
    { words: ["is", "less", "than"], type: TokenType.IsLessThan },
    { words: ["is", "equal", "to"], type: TokenType.IsEqualTo },
    { words: ["storing", "result", "in"], type: TokenType.StoringResultIn },
    ...TYPE_CHECKS,
    { words: ["if", "unsuccessful"], type: TokenType.IfUnsuccessful },
    { words: ["then", "continue"], type: TokenType.ThenContinue },
    { words: ["otherwise", "if"], type: TokenType.OtherwiseIf },
    { words: ["belongs", "to"], type: TokenType.BelongsTo },
    { words: ["for", "each"], type: TokenType.ForEach },
    { words: ["character", "at"], type: TokenType.CharacterAt },
    { words: ["length", "of"], type: TokenType.LengthOf },
    { words: ["type", "of"], type: TokenType.TypeOf },
    { words: ["added", "to"], type: TokenType.AddedTo },
    { words: ["split", "by"], type: TokenType.SplitBy },
    { words: ["starts", "with"], type: TokenType.StartsWith },
    { words: ["ends", "with"], type: TokenType.EndsWith },
    { words: ["is", "in"], type: TokenType.IsIn },
].sort((a, b) => b.words.length - a.words.length);
