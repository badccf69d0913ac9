import { SourceLocation, ValueType } from "@stepslang/library";

export type Expression =
    | { type: "NumberLiteral"; value: number; loc: SourceLocation }
    | { type: "TextLiteral"; value: string; loc: SourceLocation }
    | { type: "BooleanLiteral"; value: boolean; loc: SourceLocation }
    | { type: "NothingLiteral"; loc: SourceLocation }
    | { type: "InputExpression"; loc: SourceLocation }
    | { type: "Identifier"; name: string; loc: SourceLocation }
    | ListLiteral
    | TableLiteral
    | BinaryExpression
    | UnaryExpression
    | TypeConversionExpression
    | DecimalFormatExpression
    | TypeCheckExpression
    | TableAccessExpression
    | LengthOfExpression
    | CharacterAtExpression
    | TypeOfExpression
    | WordExpression;

export interface ListLiteral {
    type: "ListLiteral";
    elements: Expression[];
    loc: SourceLocation;
}

export interface TableLiteral {
    type: "TableLiteral";
    entries: { key: Expression; value: Expression }[];
    loc: SourceLocation;
}

export type BinaryOperator =
    | "+"
    | "-"
    | "*"
    | "/"
    | "%"
    | "and"
    | "or"
    | "=="
    | "!="
    | "<"
    | ">"
    | "<="
    | ">=";

export interface BinaryExpression {
    type: "BinaryExpression";
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
    loc: SourceLocation;
}

export interface UnaryExpression {
    type: "UnaryExpression";
    operator: "-" | "not";
    operand: Expression;
    loc: SourceLocation;
}

/** `value as number` */
export interface TypeConversionExpression {
    type: "TypeConversion";
    value: Expression;
    target: ValueType;
    loc: SourceLocation;
}

/** `value as decimal(places)` */
export interface DecimalFormatExpression {
    type: "DecimalFormat";
    value: Expression;
    places: Expression;
    loc: SourceLocation;
}

/** `value is a number` */
export interface TypeCheckExpression {
    type: "TypeCheck";
    value: Expression;
    checkType: ValueType;
    loc: SourceLocation;
}

export interface TableAccessExpression {
    type: "TableAccess";
    target: Expression;
    key: Expression;
    loc: SourceLocation;
}

export interface LengthOfExpression {
    type: "LengthOf";
    value: Expression;
    loc: SourceLocation;
}

/** `character at index of source` */
export interface CharacterAtExpression {
    type: "CharacterAt";
    index: Expression;
    source: Expression;
    loc: SourceLocation;
}

export interface TypeOfExpression {
    type: "TypeOf";
    value: Expression;
    loc: SourceLocation;
}

export type WordOperator =
    | "AddedTo"
    | "SplitBy"
    | "Contains"
    | "StartsWith"
    | "EndsWith"
    | "IsIn";

/** Infix operators spelled as words, e.g. `name starts with "A"`. */
export interface WordExpression {
    type: "WordExpression";
    operator: WordOperator;
    left: Expression;
    right: Expression;
    loc: SourceLocation;
}
