import { ErrorCode, StepsError, makeError } from "@stepslang/library";
import { Token } from "./Token";
import { TokenType } from "./TokenType";
import { KEYWORDS, PHRASES } from "./keywords";

const INDENT_WIDTH = 4;

/** Tokens after which a `-` is subtraction rather than a sign. */
const OPERAND_END = new Set<TokenType>([
    TokenType.NumberLiteral,
    TokenType.TextLiteral,
    TokenType.Identifier,
    TokenType.True,
    TokenType.False,
    TokenType.Nothing,
    TokenType.Input,
    TokenType.RParen,
    TokenType.RBracket,
]);

const ESCAPES: Record<string, string> = {
    n: "\n",
    t: "\t",
    r: "\r",
    "\\": "\\",
    '"': '"',
};

export class Lexer {
    private input: string;
    private file: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;

    private tokens: Token[] = [];
    private indentStack: number[] = [0];
    private atLineStart = true;

    constructor(input: string, file: string = "<string>") {
        this.input = input;
        this.file = file;
    }

    public tokenize(): Token[] {
        this.tokens = [];
        while (this.position < this.input.length) {
            if (this.atLineStart) {
                this.atLineStart = false;
                if (this.handleLineStart()) continue;
            }

            const char = this.currentChar();

            if (char === "\n") {
                this.endLine();
                this.advance();
                this.atLineStart = true;
                continue;
            }
            if (char === " " || char === "\r" || char === "\t") {
                this.advance();
                continue;
            }

            if (char === '"') {
                this.push(this.readString());
                continue;
            }

            if (
                this.isDigit(char) ||
                (char === "-" &&
                    this.isDigit(this.peekChar()) &&
                    !this.previousEndsOperand())
            ) {
                this.push(this.readNumber());
                continue;
            }

            if (this.isAlpha(char)) {
                this.readWord();
                continue;
            }

            const symbol = this.readSymbol(char);
            if (symbol) {
                this.push(symbol);
                this.advance();
                continue;
            }

            throw this.error(ErrorCode.UnexpectedCharacter, { char });
        }

        this.endLine();
        while (this.indentStack.length > 1) {
            this.indentStack.pop();
            this.push(this.createToken(TokenType.Dedent, ""));
        }
        this.push(this.createToken(TokenType.EOF, ""));
        return this.tokens;
    }

    /**
     * Measures indentation and emits INDENT/DEDENT tokens.
     * Returns true when the whole line was consumed (blank or block comment).
     */
    private handleLineStart(): boolean {
        let width = 0;
        while (this.currentChar() === " " || this.currentChar() === "\t") {
            if (this.currentChar() === "\t") {
                throw this.error(ErrorCode.TabCharacter);
            }
            width++;
            this.advance();
        }

        const rest = this.currentChar();
        if (rest === "\n" || rest === "\r" || rest === undefined) {
            this.skipLine();
            return true;
        }

        if (this.lookingAtNoteBlock()) {
            this.skipNoteBlock();
            return true;
        }

        if (this.lookingAtLineNote()) {
            this.skipLine();
            return true;
        }

        const top = this.indentStack[this.indentStack.length - 1];
        if (width < top) {
            if (!this.indentStack.includes(width)) {
                throw this.error(
                    ErrorCode.InconsistentIndentation,
                    {
                        spaces: width,
                        levels: this.indentStack.join(", "),
                    },
                    1,
                );
            }
            while (this.indentStack[this.indentStack.length - 1] > width) {
                this.indentStack.pop();
                this.push(this.createToken(TokenType.Dedent, ""));
            }
            return false;
        }

        if (width % INDENT_WIDTH !== 0 || width - top > INDENT_WIDTH) {
            throw this.error(ErrorCode.BadIndentation, { spaces: width }, 1);
        }
        if (width > top) {
            this.indentStack.push(width);
            this.push(this.createToken(TokenType.Indent, ""));
        }
        return false;
    }

    private endLine() {
        const last = this.tokens[this.tokens.length - 1];
        if (
            last &&
            last.type !== TokenType.Newline &&
            last.type !== TokenType.Indent &&
            last.type !== TokenType.Dedent
        ) {
            this.push(this.createToken(TokenType.Newline, ""));
        }
    }

    private lookingAtNoteBlock(): boolean {
        return /^note[ ]+block[ ]*:/.test(this.restOfLine());
    }

    private lookingAtLineNote(): boolean {
        return /^note[ ]*:/.test(this.restOfLine());
    }

    private skipNoteBlock() {
        this.skipLine();
        while (this.position < this.input.length) {
            const done = /^[ ]*end[ ]+note\b/.test(this.restOfLine());
            this.skipLine();
            if (done) return;
        }
    }

    private skipLine() {
        while (
            this.position < this.input.length &&
            this.currentChar() !== "\n"
        ) {
            this.advance();
        }
        if (this.position < this.input.length) this.advance();
        this.atLineStart = true;
    }

    private restOfLine(): string {
        const end = this.input.indexOf("\n", this.position);
        return this.input.slice(
            this.position,
            end === -1 ? this.input.length : end,
        );
    }

    private readWord() {
        const phrase = this.matchPhrase();
        if (phrase) {
            const token = this.createToken(phrase.type, phrase.value);
            while (this.position < phrase.end) this.advance();
            this.push(token);
            return;
        }

        const token = this.readIdentifier();
        if (token.value === "note" && /^[ ]*:/.test(this.restOfLine())) {
            // Trailing comment: drop the rest of the line.
            while (
                this.position < this.input.length &&
                this.currentChar() !== "\n"
            ) {
                this.advance();
            }
            return;
        }
        this.push(token);
    }

    private matchPhrase(): { type: TokenType; value: string; end: number } | null {
        for (const phrase of PHRASES) {
            let offset = this.position;
            let matched = true;
            for (let i = 0; i < phrase.words.length; i++) {
                const word = phrase.words[i];
                if (i > 0) {
                    if (this.input[offset] !== " ") {
                        matched = false;
                        break;
                    }
                    while (this.input[offset] === " ") offset++;
                }
                if (!this.input.startsWith(word, offset)) {
                    matched = false;
                    break;
                }
                offset += word.length;
            }
            const next = this.input[offset];
            if (matched && (next === undefined || !this.isAlphaNumeric(next))) {
                return {
                    type: phrase.type,
                    value: phrase.value ?? phrase.words.join(" "),
                    end: offset,
                };
            }
        }
        return null;
    }

    private readSymbol(char: string): Token | null {
        const types: Record<string, TokenType> = {
            "+": TokenType.PlusOp,
            "-": TokenType.MinusOp,
            "*": TokenType.MultiplyOp,
            "/": TokenType.DivideOp,
            "%": TokenType.PercentOp,
            ":": TokenType.Colon,
            ",": TokenType.Comma,
            "[": TokenType.LBracket,
            "]": TokenType.RBracket,
            "(": TokenType.LParen,
            ")": TokenType.RParen,
        };
        const type = types[char];
        return type ? this.createToken(type, char) : null;
    }

    private previousEndsOperand(): boolean {
        const last = this.tokens[this.tokens.length - 1];
        return last !== undefined && OPERAND_END.has(last.type);
    }

    private push(token: Token) {
        this.tokens.push(token);
    }

    private createToken(type: TokenType, value: string): Token {
        return { type, value, line: this.line, col: this.col };
    }

    private error(
        code: ErrorCode,
        params: Record<string, string | number> = {},
        col: number = this.col,
        line: number = this.line,
    ): StepsError {
        return makeError(code, params, { file: this.file, line, col }).withContext(
            this.input,
        );
    }

    private advance() {
        if (this.currentChar() === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z_]/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /[a-zA-Z0-9_]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private readNumber(): Token {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        if (this.currentChar() === "-") {
            value += "-";
            this.advance();
        }

        while (
            this.position < this.input.length &&
            this.isDigit(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
            value += ".";
            this.advance(); // consume dot

            while (
                this.position < this.input.length &&
                this.isDigit(this.currentChar())
            ) {
                value += this.currentChar();
                this.advance();
            }
        }

        return {
            type: TokenType.NumberLiteral,
            value,
            line: startLine,
            col: startCol,
            length: value.length,
        };
    }

    private readString(): Token {
        const startLine = this.line;
        const startCol = this.col;
        const startPosition = this.position;
        this.advance(); // skip quote

        let value = "";
        while (this.currentChar() !== '"') {
            const char = this.currentChar();
            if (char === undefined || char === "\n") {
                throw this.error(
                    ErrorCode.UnterminatedString,
                    {},
                    startCol,
                    startLine,
                );
            }
            if (char === "\\") {
                const escaped = ESCAPES[this.peekChar()];
                if (escaped === undefined) {
                    throw this.error(ErrorCode.UnexpectedCharacter, {
                        char: `\\${this.peekChar()}`,
                    });
                }
                value += escaped;
                this.advance();
                this.advance();
                continue;
            }
            value += char;
            this.advance();
        }
        this.advance(); // skip close quote

        return {
            type: TokenType.TextLiteral,
            value,
            line: startLine,
            col: startCol,
            length: this.position - startPosition,
        };
    }

    private readIdentifier(): Token {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        const type = Object.hasOwn(KEYWORDS, value)
            ? KEYWORDS[value]
            : TokenType.Identifier;
        return { type, value, line: startLine, col: startCol };
    }
}

export function tokenize(source: string, file?: string): Token[] {
    return new Lexer(source, file).tokenize();
}
