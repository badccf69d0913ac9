export enum TokenType {
    // Structure
    Building = "Building", // building
    Floor = "Floor", // floor
    Step = "Step", // step
    Riser = "Riser", // riser
    BelongsTo = "BelongsTo", // belongs to
    Expects = "Expects", // expects
    Returns = "Returns", // returns
    Declare = "Declare", // declare
    Do = "Do", // do

    // Statements
    Display = "Display",
    Set = "Set",
    To = "To",
    Call = "Call",
    With = "With",
    StoringResultIn = "StoringResultIn", // storing result in
    Return = "Return",
    Exit = "Exit",
    If = "If",
    OtherwiseIf = "OtherwiseIf", // otherwise if
    Otherwise = "Otherwise",
    Repeat = "Repeat",
    Times = "Times",
    ForEach = "ForEach", // for each
    In = "In",
    While = "While",
    Attempt = "Attempt",
    IfUnsuccessful = "IfUnsuccessful", // if unsuccessful
    ThenContinue = "ThenContinue", // then continue
    Add = "Add",
    Remove = "Remove",
    From = "From",
    As = "As",
    Fixed = "Fixed",
    Input = "Input",

    // Types
    TypeName = "TypeName", // number, text, boolean, list, table

    // Boolean operators
    And = "And",
    Or = "Or",
    Not = "Not",

    // Comparison and word operators
    IsEqualTo = "IsEqualTo",
    Equals = "Equals",
    IsNotEqualTo = "IsNotEqualTo",
    IsLessThan = "IsLessThan",
    IsGreaterThan = "IsGreaterThan",
    IsLessThanOrEqualTo = "IsLessThanOrEqualTo",
    IsGreaterThanOrEqualTo = "IsGreaterThanOrEqualTo",
    IsIn = "IsIn",
    IsA = "IsA", // is a <type> (value holds the type name)
    Contains = "Contains",
    StartsWith = "StartsWith",
    EndsWith = "EndsWith",
    AddedTo = "AddedTo",
    SplitBy = "SplitBy",
    LengthOf = "LengthOf",
    CharacterAt = "CharacterAt",
    Of = "Of",
    TypeOf = "TypeOf",
    Modulo = "Modulo",

    // Math operators
    PlusOp = "PlusOp", // +
    MinusOp = "MinusOp", // -
    MultiplyOp = "MultiplyOp", // *
    DivideOp = "DivideOp", // /
    PercentOp = "PercentOp", // %

    // Symbols
    Colon = "Colon", // :
    Comma = "Comma", // ,
    LBracket = "LBracket", // [
    RBracket = "RBracket", // ]
    LParen = "LParen", // (
    RParen = "RParen", // )

    // Literals
    NumberLiteral = "NumberLiteral",
    TextLiteral = "TextLiteral",
    True = "True",
    False = "False",
    Nothing = "Nothing",

    Identifier = "Identifier",

    // Layout
    Newline = "Newline",
    Indent = "Indent",
    Dedent = "Dedent",
    EOF = "EOF",
}
