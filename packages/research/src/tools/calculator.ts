export class CalculationError extends Error {
    public constructor(message: string) {
        super(message);
        this.name = 'CalculationError';
    }
}

type Token =
    | { kind: 'number'; value: number; position: number }
    | { kind: 'operator'; value: '+' | '-' | '*' | '/' | '%' | '^'; position: number }
    | { kind: 'paren'; value: '(' | ')'; position: number };

const OPERATORS = new Set(['+', '-', '*', '/', '%', '^']);
const NUMBER = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

function isOperator(char: string): char is '+' | '-' | '*' | '/' | '%' | '^' {
    return OPERATORS.has(char);
}

function tokenize(expression: string): Token[] {
    const tokens: Token[] = [];
    let position = 0;

    while (position < expression.length) {
        const char = expression.charAt(position);
        if (/\s/.test(char)) {
            position += 1;
            continue;
        }
        if (char === '(' || char === ')') {
            tokens.push({ kind: 'paren', value: char, position });
            position += 1;
            continue;
        }
        if (isOperator(char)) {
            tokens.push({ kind: 'operator', value: char, position });
            position += 1;
            continue;
        }
        const match = NUMBER.exec(expression.slice(position));
        if (match) {
            tokens.push({ kind: 'number', value: Number(match[0]), position });
            position += match[0].length;
            continue;
        }
        throw new CalculationError(`unexpected character '${char}' at position ${position}`);
    }

    return tokens;
}

/**
 * Recursive-descent evaluator for `+ - * / % ^`, parentheses and unary signs.
 * `^` is exponentiation and binds tighter than unary minus: `-2^2` is `-4`.
 */
class Parser {
    private index = 0;

    public constructor(private readonly tokens: Token[]) { }

    public parse(): number {
        if (this.tokens.length === 0) {
            throw new CalculationError('empty expression');
        }
        const value = this.expression();
        const extra = this.peek();
        if (extra) {
            throw new CalculationError(`unexpected '${extra.value}' at position ${extra.position}`);
        }
        return value;
    }

    // expression := term (('+' | '-') term)*
    private expression(): number {
        let value = this.term();
        for (let token = this.peek(); token?.kind === 'operator' && (token.value === '+' || token.value === '-'); token = this.peek()) {
            this.index += 1;
            const right = this.term();
            value = token.value === '+' ? value + right : value - right;
        }
        return value;
    }

    // term := unary (('*' | '/' | '%') unary)*
    private term(): number {
        let value = this.unary();
        for (let token = this.peek(); token?.kind === 'operator' && (token.value === '*' || token.value === '/' || token.value === '%'); token = this.peek()) {
            this.index += 1;
            const right = this.unary();
            if ((token.value === '/' || token.value === '%') && right === 0) {
                throw new CalculationError(token.value === '/' ? 'division by zero' : 'modulo by zero');
            }
            value = token.value === '*' ? value * right : token.value === '/' ? value / right : value % right;
        }
        return value;
    }

    // unary := ('+' | '-') unary | power
    private unary(): number {
        const token = this.peek();
        if (token?.kind === 'operator' && (token.value === '+' || token.value === '-')) {
            this.index += 1;
            const operand = this.unary();
            return token.value === '-' ? -operand : operand;
        }
        return this.power();
    }

    // power := primary ('^' unary)?
    private power(): number {
        const base = this.primary();
        const token = this.peek();
        if (token?.kind === 'operator' && token.value === '^') {
            this.index += 1;
            return base ** this.unary();
        }
        return base;
    }

    // primary := number | '(' expression ')'
    private primary(): number {
        const token = this.next();
        if (token.kind === 'number') {
            return token.value;
        }
        if (token.kind === 'paren' && token.value === '(') {
            const value = this.expression();
            const closing = this.next();
            if (closing.kind !== 'paren' || closing.value !== ')') {
                throw new CalculationError(`expected ')' at position ${closing.position}`);
            }
            return value;
        }
        throw new CalculationError(`unexpected '${token.value}' at position ${token.position}`);
    }

    private peek(): Token | undefined {
        return this.tokens[this.index];
    }

    private next(): Token {
        const token = this.tokens[this.index];
        if (!token) {
            throw new CalculationError('unexpected end of expression');
        }
        this.index += 1;
        return token;
    }
}

export function evaluateExpression(expression: string): number {
    const result = new Parser(tokenize(expression)).parse();
    if (!Number.isFinite(result)) {
        throw new CalculationError('result is not a finite number');
    }
    return result;
}
