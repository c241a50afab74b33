import { ParseError } from '../errors/index';
import { type PyToken, TokenKind, syntaxError, tokenizePython } from './python-tokenizer';

const KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue',
  'def', 'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in',
  'is', 'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

// Keywords that can open an expression.
const EXPRESSION_KEYWORDS = new Set(['False', 'None', 'True', 'await', 'lambda', 'not']);
const EXPRESSION_OPENERS = new Set(['(', '[', '{', '-', '+', '~', '...']);

const AUGMENTED_ASSIGN = new Set(['+=', '-=', '*=', '/=', '//=', '%=', '@=', '&=', '|=', '^=', '>>=', '<<=', '**=']);
const COMPARISON_OPS = new Set(['==', '!=', '<', '<=', '>', '>=']);

/**
 * What an expression turned out to be, as far as assignment and deletion
 * targets care.
 */
type Expr =
  | { kind: 'name' | 'attribute' | 'subscript'; start: PyToken }
  | { kind: 'starred'; start: PyToken; value: Expr }
  | { kind: 'tuple' | 'list'; start: PyToken; elements: Expr[] }
  | { kind: 'other'; start: PyToken; description: string };

type TargetVerb = 'assign to' | 'delete';

function other(start: PyToken, description: string): Expr {
  return { kind: 'other', start, description };
}

function isSimpleTarget(expr: Expr): boolean {
  return expr.kind === 'name' || expr.kind === 'attribute' || expr.kind === 'subscript';
}

/**
 * Recursive-descent recognizer for the Python 3 grammar. It builds no tree;
 * it only accepts or rejects with the position of the first offending token.
 */
class SyntaxValidator {
  private pos = 0;

  constructor(private readonly tokens: PyToken[]) {}

  validate(): void {
    while (!this.at(TokenKind.End)) {
      this.statement();
    }
  }

  // --- token helpers

  private peek(offset = 0): PyToken {
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) {
      throw new ParseError('invalid syntax at line 1, column 1', 1, 1);
    }
    return token;
  }

  private next(): PyToken {
    const token = this.peek();
    if (token.kind !== TokenKind.End) this.pos++;
    return token;
  }

  private at(kind: TokenKind, offset = 0): boolean {
    return this.peek(offset).kind === kind;
  }

  private atOp(op: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === TokenKind.Op && token.text === op;
  }

  private atKeyword(word: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === TokenKind.Name && token.text === word;
  }

  private atIdentifier(offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === TokenKind.Name && !KEYWORDS.has(token.text);
  }

  private acceptOp(op: string): boolean {
    if (!this.atOp(op)) return false;
    this.pos++;
    return true;
  }

  private acceptKeyword(word: string): boolean {
    if (!this.atKeyword(word)) return false;
    this.pos++;
    return true;
  }

  private expectOp(op: string): PyToken {
    if (!this.atOp(op)) this.fail();
    return this.next();
  }

  private expectKeyword(word: string): PyToken {
    if (!this.atKeyword(word)) this.fail();
    return this.next();
  }

  private expectName(): PyToken {
    if (!this.atIdentifier()) this.fail();
    return this.next();
  }

  private expectNewline(): void {
    if (!this.at(TokenKind.Newline)) this.fail();
    this.next();
  }

  private fail(token: PyToken = this.peek(), reason = 'invalid syntax'): never {
    throw syntaxError(reason, token.line, token.column);
  }

  private attempt(parse: () => void): boolean {
    const mark = this.pos;
    try {
      parse();
      return true;
    } catch (e: unknown) {
      if (!(e instanceof ParseError)) throw e;
      this.pos = mark;
      return false;
    }
  }

  private startsExpression(allowStar: boolean): boolean {
    const token = this.peek();
    switch (token.kind) {
      case TokenKind.Number:
      case TokenKind.String:
        return true;
      case TokenKind.Name:
        return !KEYWORDS.has(token.text) || EXPRESSION_KEYWORDS.has(token.text);
      case TokenKind.Op:
        return EXPRESSION_OPENERS.has(token.text) || (allowStar && token.text === '*');
      default:
        return false;
    }
  }

  // --- statements

  private statement(): void {
    const token = this.peek();
    if (token.kind === TokenKind.Indent) this.fail(token, 'unexpected indent');
    if (token.kind === TokenKind.Dedent) this.fail(token, 'unindent does not match any outer indentation level');
    if (this.atOp('@')) return this.decorated();
    if (token.kind === TokenKind.Name) {
      switch (token.text) {
        case 'def':
          return this.functionDef();
        case 'class':
          return this.classDef();
        case 'if':
          return this.ifStatement();
        case 'while':
          return this.whileStatement();
        case 'for':
          return this.forStatement();
        case 'try':
          return this.tryStatement();
        case 'with':
          return this.withStatement();
        case 'async':
          return this.asyncStatement();
        case 'match':
          if (this.matchStatement()) return;
          break;
      }
    }
    this.simpleStatements();
  }

  private simpleStatements(): void {
    this.simpleStatement();
    while (this.acceptOp(';')) {
      if (this.at(TokenKind.Newline)) break;
      this.simpleStatement();
    }
    this.expectNewline();
  }

  private block(): void {
    if (!this.at(TokenKind.Newline)) {
      this.simpleStatements();
      return;
    }
    this.next();
    if (!this.at(TokenKind.Indent)) this.fail(this.peek(), 'expected an indented block');
    this.next();
    do {
      if (this.at(TokenKind.End)) this.fail();
      this.statement();
    } while (!this.at(TokenKind.Dedent));
    this.next();
  }

  private simpleStatement(): void {
    const token = this.peek();
    if (token.kind !== TokenKind.Name || !KEYWORDS.has(token.text)) {
      this.expressionStatement();
      return;
    }
    switch (token.text) {
      case 'pass':
      case 'break':
      case 'continue':
        this.next();
        return;
      case 'return':
        this.next();
        if (this.startsExpression(true)) this.starExpressions();
        return;
      case 'raise':
        this.next();
        if (this.startsExpression(false)) {
          this.expression();
          if (this.acceptKeyword('from')) this.expression();
        }
        return;
      case 'global':
      case 'nonlocal':
        this.next();
        do {
          this.expectName();
        } while (this.acceptOp(','));
        return;
      case 'del':
        this.next();
        this.checkTarget(this.targetList(), 'delete');
        return;
      case 'assert':
        this.next();
        this.expression();
        if (this.acceptOp(',')) this.expression();
        return;
      case 'import':
        return this.importStatement();
      case 'from':
        return this.fromImport();
      case 'yield':
        this.yieldExpression();
        return;
      default:
        this.expressionStatement();
    }
  }

  private expressionStatement(): void {
    const first = this.starExpressions();

    if (this.atOp(':')) {
      if (!isSimpleTarget(first)) {
        this.fail(
          first.start,
          first.kind === 'tuple' ? 'only single target (not tuple) can be annotated' : 'illegal target for annotation'
        );
      }
      this.next();
      this.expression();
      if (this.acceptOp('=')) this.assignedValue();
      return;
    }

    const op = this.peek();
    if (op.kind === TokenKind.Op && AUGMENTED_ASSIGN.has(op.text)) {
      if (!isSimpleTarget(first)) this.fail(first.start, 'illegal expression for augmented assignment');
      this.next();
      this.assignedValue();
      return;
    }

    let target = first;
    while (this.atOp('=')) {
      this.checkTarget(target, 'assign to');
      this.next();
      target = this.assignedValue();
    }
  }

  private assignedValue(): Expr {
    if (this.atKeyword('yield')) {
      const start = this.peek();
      this.yieldExpression();
      return other(start, 'yield expression');
    }
    return this.starExpressions();
  }

  private checkTarget(expr: Expr, verb: TargetVerb, nested = false): void {
    switch (expr.kind) {
      case 'name':
      case 'attribute':
      case 'subscript':
        return;
      case 'starred':
        if (verb === 'delete') this.fail(expr.start, 'cannot delete starred');
        if (!nested) this.fail(expr.start, 'starred assignment target must be in a list or tuple');
        this.checkTarget(expr.value, verb, false);
        return;
      case 'tuple':
      case 'list': {
        const starred = expr.elements.filter((element) => element.kind === 'starred');
        if (starred.length > 1) this.fail(expr.start, 'multiple starred expressions in assignment');
        for (const element of expr.elements) {
          this.checkTarget(element, verb, true);
        }
        return;
      }
      case 'other':
        this.fail(expr.start, `cannot ${verb} ${expr.description}`);
    }
  }

  private importStatement(): void {
    this.expectKeyword('import');
    do {
      this.dottedName();
      if (this.acceptKeyword('as')) this.expectName();
    } while (this.acceptOp(','));
  }

  private fromImport(): void {
    this.expectKeyword('from');
    let dots = 0;
    while (this.atOp('.') || this.atOp('...')) {
      dots += this.next().text.length;
    }
    if (dots === 0 || !this.atKeyword('import')) this.dottedName();
    this.expectKeyword('import');
    if (this.acceptOp('*')) return;

    const parenthesized = this.acceptOp('(');
    for (;;) {
      this.expectName();
      if (this.acceptKeyword('as')) this.expectName();
      if (!this.atOp(',')) break;
      const comma = this.next();
      if (parenthesized && this.atOp(')')) break;
      if (!parenthesized && this.at(TokenKind.Newline)) {
        this.fail(comma, 'trailing comma not allowed without surrounding parentheses');
      }
    }
    if (parenthesized) this.expectOp(')');
  }

  private dottedName(): void {
    this.expectName();
    while (this.acceptOp('.')) this.expectName();
  }

  private decorated(): void {
    while (this.acceptOp('@')) {
      this.namedExpression();
      this.expectNewline();
    }
    if (this.atKeyword('def')) return this.functionDef();
    if (this.atKeyword('class')) return this.classDef();
    if (this.atKeyword('async') && this.atKeyword('def', 1)) return this.asyncStatement();
    this.fail();
  }

  private asyncStatement(): void {
    this.expectKeyword('async');
    if (this.atKeyword('def')) return this.functionDef();
    if (this.atKeyword('for')) return this.forStatement();
    if (this.atKeyword('with')) return this.withStatement();
    this.fail();
  }

  private functionDef(): void {
    this.expectKeyword('def');
    this.expectName();
    this.expectOp('(');
    this.parameters(')', true);
    this.expectOp(')');
    if (this.acceptOp('->')) this.expression();
    this.expectOp(':');
    this.block();
  }

  private classDef(): void {
    this.expectKeyword('class');
    this.expectName();
    if (this.acceptOp('(')) this.callArguments();
    this.expectOp(':');
    this.block();
  }

  private parameters(closer: ')' | ':', annotated: boolean): void {
    let count = 0;
    let sawDefault = false;
    let sawSlash = false;
    let sawStar = false;
    let sawDoubleStar = false;
    let bareStar: PyToken | undefined;

    const annotation = (allowStar: boolean): void => {
      if (!annotated || !this.acceptOp(':')) return;
      if (allowStar && this.acceptOp('*')) {
        this.bitwiseOr();
        return;
      }
      this.expression();
    };

    while (!this.atOp(closer)) {
      const token = this.peek();
      if (sawDoubleStar) this.fail(token, 'arguments cannot follow var-keyword argument');

      if (this.acceptOp('/')) {
        if (count === 0) this.fail(token, 'at least one argument must precede /');
        if (sawSlash) this.fail(token, '/ may appear only once');
        if (sawStar) this.fail(token, '/ must be ahead of *');
        sawSlash = true;
      } else if (this.acceptOp('**')) {
        this.expectName();
        annotation(false);
        if (bareStar) this.fail(bareStar, 'named arguments must follow bare *');
        sawDoubleStar = true;
      } else if (this.acceptOp('*')) {
        if (sawStar) this.fail(token, '* argument may appear only once');
        sawStar = true;
        if (this.atOp(',') || this.atOp(closer)) {
          bareStar = token;
        } else {
          this.expectName();
          annotation(true);
        }
      } else {
        this.expectName();
        annotation(false);
        if (this.acceptOp('=')) {
          this.expression();
          if (!sawStar) sawDefault = true;
        } else if (sawDefault && !sawStar) {
          this.fail(token, 'non-default argument follows default argument');
        }
        bareStar = undefined;
        count++;
      }

      if (!this.acceptOp(',')) break;
    }
    if (bareStar) this.fail(bareStar, 'named arguments must follow bare *');
  }

  private ifStatement(): void {
    this.expectKeyword('if');
    this.namedExpression();
    this.expectOp(':');
    this.block();
    while (this.acceptKeyword('elif')) {
      this.namedExpression();
      this.expectOp(':');
      this.block();
    }
    this.elseClause();
  }

  private whileStatement(): void {
    this.expectKeyword('while');
    this.namedExpression();
    this.expectOp(':');
    this.block();
    this.elseClause();
  }

  private forStatement(): void {
    this.expectKeyword('for');
    this.checkTarget(this.targetList(), 'assign to');
    this.expectKeyword('in');
    this.starExpressions();
    this.expectOp(':');
    this.block();
    this.elseClause();
  }

  private elseClause(): void {
    if (!this.acceptKeyword('else')) return;
    this.expectOp(':');
    this.block();
  }

  private tryStatement(): void {
    this.expectKeyword('try');
    this.expectOp(':');
    this.block();

    let handlers = 0;
    let bareExcept: PyToken | undefined;
    let starred: boolean | undefined;
    while (this.atKeyword('except')) {
      const token = this.next();
      if (bareExcept) this.fail(bareExcept, "default 'except:' must be last");
      const isStar = this.acceptOp('*');
      if (starred !== undefined && starred !== isStar) {
        this.fail(token, "cannot have both 'except' and 'except*' on the same 'try'");
      }
      starred = isStar;
      if (this.atOp(':')) {
        if (isStar) this.fail(this.peek(), 'expected one or more exception types');
        bareExcept = token;
      } else {
        this.expression();
        if (this.acceptKeyword('as')) this.expectName();
      }
      this.expectOp(':');
      this.block();
      handlers++;
    }

    if (this.atKeyword('else')) {
      if (handlers === 0) this.fail();
      this.elseClause();
    }
    if (this.acceptKeyword('finally')) {
      this.expectOp(':');
      this.block();
    } else if (handlers === 0) {
      this.fail(this.peek(), "expected 'except' or 'finally' block");
    }
  }

  private withStatement(): void {
    this.expectKeyword('with');
    const parenthesized =
      this.atOp('(') &&
      this.attempt(() => {
        this.expectOp('(');
        do {
          if (this.atOp(')')) break;
          this.withItem();
        } while (this.acceptOp(','));
        this.expectOp(')');
        if (!this.atOp(':')) this.fail();
      });
    if (!parenthesized) {
      do {
        this.withItem();
      } while (this.acceptOp(','));
    }
    this.expectOp(':');
    this.block();
  }

  private withItem(): void {
    this.expression();
    if (this.acceptKeyword('as')) {
      this.checkTarget(this.starTarget(), 'assign to');
    }
  }

  /*
   * `match` is a soft keyword: the header is tried first and the line falls
   * back to a simple statement when it does not read as `match <subject>:`.
   */
  private matchStatement(): boolean {
    const header = this.attempt(() => {
      this.next();
      this.starNamedExpression();
      if (this.acceptOp(',')) {
        while (this.startsExpression(true)) {
          this.starNamedExpression();
          if (!this.acceptOp(',')) break;
        }
      }
      this.expectOp(':');
      if (!this.at(TokenKind.Newline)) this.fail();
    });
    if (!header) return false;

    this.expectNewline();
    if (!this.at(TokenKind.Indent)) this.fail(this.peek(), 'expected an indented block');
    this.next();
    do {
      this.caseBlock();
    } while (!this.at(TokenKind.Dedent));
    this.next();
    return true;
  }

  private caseBlock(): void {
    if (!this.atKeyword('case')) this.fail();
    this.next();
    this.maybeStarPattern();
    if (this.acceptOp(',')) {
      while (!this.atOp(':') && !this.atKeyword('if')) {
        this.maybeStarPattern();
        if (!this.acceptOp(',')) break;
      }
    }
    if (this.acceptKeyword('if')) this.namedExpression();
    this.expectOp(':');
    this.block();
  }

  // --- patterns

  private maybeStarPattern(): void {
    if (this.acceptOp('*')) {
      this.expectName();
      return;
    }
    this.pattern();
  }

  private pattern(): void {
    this.closedPattern();
    while (this.acceptOp('|')) this.closedPattern();
    if (this.acceptKeyword('as')) {
      const name = this.expectName();
      if (name.text === '_') this.fail(name, "cannot use '_' as a target");
    }
  }

  private closedPattern(): void {
    const token = this.peek();
    if (token.kind === TokenKind.Number || this.atOp('-')) {
      this.signedNumber();
      return;
    }
    if (token.kind === TokenKind.String) {
      while (this.at(TokenKind.String)) this.next();
      return;
    }
    if (this.atKeyword('None') || this.atKeyword('True') || this.atKeyword('False')) {
      this.next();
      return;
    }
    if (this.atIdentifier()) {
      this.dottedName();
      if (this.acceptOp('(')) this.classPatternArguments();
      return;
    }
    if (this.acceptOp('(')) {
      if (this.acceptOp(')')) return;
      this.maybeStarPattern();
      if (this.acceptOp(')')) return;
      this.expectOp(',');
      this.patternsUntil(')');
      return;
    }
    if (this.acceptOp('[')) {
      this.patternsUntil(']');
      return;
    }
    if (this.acceptOp('{')) {
      this.mappingPattern();
      return;
    }
    this.fail();
  }

  private patternsUntil(closer: string): void {
    while (!this.atOp(closer)) {
      this.maybeStarPattern();
      if (!this.acceptOp(',')) break;
    }
    this.expectOp(closer);
  }

  private signedNumber(): void {
    this.acceptOp('-');
    if (!this.at(TokenKind.Number)) this.fail();
    this.next();
    if (this.atOp('+') || this.atOp('-')) {
      this.next();
      if (!this.at(TokenKind.Number)) this.fail();
      this.next();
    }
  }

  private mappingPattern(): void {
    while (!this.atOp('}')) {
      if (this.acceptOp('**')) {
        this.expectName();
      } else {
        if (this.atIdentifier()) {
          this.expectName();
          if (!this.atOp('.')) this.fail();
          while (this.acceptOp('.')) this.expectName();
        } else {
          this.closedPattern();
        }
        this.expectOp(':');
        this.pattern();
      }
      if (!this.acceptOp(',')) break;
    }
    this.expectOp('}');
  }

  private classPatternArguments(): void {
    let sawKeyword = false;
    while (!this.atOp(')')) {
      if (this.atIdentifier() && this.atOp('=', 1)) {
        this.next();
        this.next();
        this.pattern();
        sawKeyword = true;
      } else {
        if (sawKeyword) this.fail(this.peek(), 'positional patterns follow keyword patterns');
        this.pattern();
      }
      if (!this.acceptOp(',')) break;
    }
    this.expectOp(')');
  }

  // --- expressions

  private yieldExpression(): void {
    this.expectKeyword('yield');
    if (this.acceptKeyword('from')) {
      this.expression();
    } else if (this.startsExpression(true)) {
      this.starExpressions();
    }
  }

  private starExpressions(): Expr {
    const start = this.peek();
    const first = this.starExpression();
    if (!this.atOp(',')) return first;
    const elements = [first];
    while (this.acceptOp(',')) {
      if (!this.startsExpression(true)) break;
      elements.push(this.starExpression());
    }
    return { kind: 'tuple', start, elements };
  }

  private starExpression(): Expr {
    const start = this.peek();
    if (this.acceptOp('*')) return { kind: 'starred', start, value: this.bitwiseOr() };
    return this.expression();
  }

  private starNamedExpression(): Expr {
    const start = this.peek();
    if (this.acceptOp('*')) return { kind: 'starred', start, value: this.bitwiseOr() };
    return this.namedExpression();
  }

  private targetList(): Expr {
    const start = this.peek();
    const first = this.starTarget();
    if (!this.atOp(',')) return first;
    const elements = [first];
    while (this.acceptOp(',')) {
      if (!this.startsExpression(true)) break;
      elements.push(this.starTarget());
    }
    return { kind: 'tuple', start, elements };
  }

  private starTarget(): Expr {
    const start = this.peek();
    if (this.acceptOp('*')) return { kind: 'starred', start, value: this.starTarget() };
    return this.bitwiseOr();
  }

  private namedExpression(): Expr {
    const start = this.peek();
    if (this.atIdentifier() && this.atOp(':=', 1)) {
      this.next();
      this.next();
      this.expression();
      return other(start, 'named expression');
    }
    return this.expression();
  }

  private expression(): Expr {
    const start = this.peek();
    if (this.atKeyword('lambda')) {
      this.lambda();
      return other(start, 'lambda');
    }
    const condition = this.disjunction();
    if (!this.acceptKeyword('if')) return condition;
    this.disjunction();
    this.expectKeyword('else');
    this.expression();
    return other(start, 'conditional expression');
  }

  private lambda(): void {
    this.expectKeyword('lambda');
    this.parameters(':', false);
    this.expectOp(':');
    this.expression();
  }

  private disjunction(): Expr {
    const start = this.peek();
    const first = this.conjunction();
    if (!this.atKeyword('or')) return first;
    while (this.acceptKeyword('or')) this.conjunction();
    return other(start, 'expression');
  }

  private conjunction(): Expr {
    const start = this.peek();
    const first = this.inversion();
    if (!this.atKeyword('and')) return first;
    while (this.acceptKeyword('and')) this.inversion();
    return other(start, 'expression');
  }

  private inversion(): Expr {
    const start = this.peek();
    if (this.acceptKeyword('not')) {
      this.inversion();
      return other(start, 'expression');
    }
    return this.comparison();
  }

  private comparison(): Expr {
    const start = this.peek();
    const first = this.bitwiseOr();
    let compared = false;
    for (;;) {
      const token = this.peek();
      if (token.kind === TokenKind.Op && COMPARISON_OPS.has(token.text)) {
        this.next();
      } else if (this.atKeyword('in')) {
        this.next();
      } else if (this.atKeyword('not') && this.atKeyword('in', 1)) {
        this.next();
        this.next();
      } else if (this.atKeyword('is')) {
        this.next();
        this.acceptKeyword('not');
      } else {
        break;
      }
      this.bitwiseOr();
      compared = true;
    }
    return compared ? other(start, 'comparison') : first;
  }

  private bitwiseOr(): Expr {
    return this.binary(['|'], () => this.bitwiseXor());
  }

  private bitwiseXor(): Expr {
    return this.binary(['^'], () => this.bitwiseAnd());
  }

  private bitwiseAnd(): Expr {
    return this.binary(['&'], () => this.shift());
  }

  private shift(): Expr {
    return this.binary(['<<', '>>'], () => this.sum());
  }

  private sum(): Expr {
    return this.binary(['+', '-'], () => this.term());
  }

  private term(): Expr {
    return this.binary(['*', '/', '//', '%', '@'], () => this.factor());
  }

  private binary(ops: readonly string[], operand: () => Expr): Expr {
    const start = this.peek();
    const first = operand();
    let combined = false;
    while (ops.some((op) => this.atOp(op))) {
      this.next();
      operand();
      combined = true;
    }
    return combined ? other(start, 'expression') : first;
  }

  private factor(): Expr {
    const start = this.peek();
    if (this.atOp('+') || this.atOp('-') || this.atOp('~')) {
      this.next();
      this.factor();
      return other(start, 'expression');
    }
    return this.power();
  }

  private power(): Expr {
    const start = this.peek();
    const base = this.awaitPrimary();
    if (!this.acceptOp('**')) return base;
    this.factor();
    return other(start, 'expression');
  }

  private awaitPrimary(): Expr {
    const start = this.peek();
    if (this.acceptKeyword('await')) {
      this.primary();
      return other(start, 'await expression');
    }
    return this.primary();
  }

  private primary(): Expr {
    const start = this.peek();
    let expr = this.atom();
    for (;;) {
      if (this.acceptOp('.')) {
        this.expectName();
        expr = { kind: 'attribute', start };
      } else if (this.acceptOp('(')) {
        this.callArguments();
        expr = other(start, 'function call');
      } else if (this.acceptOp('[')) {
        this.slices();
        expr = { kind: 'subscript', start };
      } else {
        return expr;
      }
    }
  }

  // Called after the opening parenthesis; consumes the closing one.
  private callArguments(): void {
    let sawKeyword = false;
    let sawDoubleStar = false;
    while (!this.atOp(')')) {
      const token = this.peek();
      if (this.acceptOp('*')) {
        if (sawDoubleStar) {
          this.fail(token, 'iterable argument unpacking follows keyword argument unpacking');
        }
        this.expression();
      } else if (this.acceptOp('**')) {
        this.expression();
        sawDoubleStar = true;
      } else if (this.atIdentifier() && this.atOp('=', 1)) {
        this.next();
        this.next();
        this.expression();
        sawKeyword = true;
      } else {
        this.namedExpression();
        if (this.atComprehension()) this.comprehensionClauses();
        if (sawDoubleStar) this.fail(token, 'positional argument follows keyword argument unpacking');
        if (sawKeyword) this.fail(token, 'positional argument follows keyword argument');
      }
      if (!this.acceptOp(',')) break;
    }
    this.expectOp(')');
  }

  // Called after the opening bracket; consumes the closing one.
  private slices(): void {
    do {
      if (this.atOp(']')) break;
      this.slice();
    } while (this.acceptOp(','));
    this.expectOp(']');
  }

  private slice(): void {
    if (this.acceptOp('*')) {
      this.bitwiseOr();
      return;
    }
    if (!this.atOp(':')) {
      this.namedExpression();
      if (!this.atOp(':')) return;
    }
    this.expectOp(':');
    if (this.startsExpression(false)) this.expression();
    if (this.acceptOp(':') && this.startsExpression(false)) this.expression();
  }

  private atom(): Expr {
    const token = this.peek();
    switch (token.kind) {
      case TokenKind.Number:
        this.next();
        return other(token, 'literal');
      case TokenKind.String:
        while (this.at(TokenKind.String)) this.next();
        return other(token, 'literal');
      case TokenKind.Name:
        if (token.text === 'True' || token.text === 'False' || token.text === 'None') {
          this.next();
          return other(token, token.text);
        }
        if (KEYWORDS.has(token.text)) this.fail(token);
        this.next();
        return { kind: 'name', start: token };
      case TokenKind.Op:
        if (token.text === '(') return this.parenthesized();
        if (token.text === '[') return this.bracketed();
        if (token.text === '{') return this.braced();
        if (token.text === '...') {
          this.next();
          return other(token, 'ellipsis');
        }
        break;
    }
    this.fail(token);
  }

  private atComprehension(): boolean {
    return this.atKeyword('for') || (this.atKeyword('async') && this.atKeyword('for', 1));
  }

  private comprehensionClauses(): void {
    while (this.atComprehension()) {
      this.acceptKeyword('async');
      this.expectKeyword('for');
      this.checkTarget(this.targetList(), 'assign to');
      this.expectKeyword('in');
      this.disjunction();
      while (this.acceptKeyword('if')) this.disjunction();
    }
  }

  private parenthesized(): Expr {
    const start = this.expectOp('(');
    if (this.acceptOp(')')) return { kind: 'tuple', start, elements: [] };
    if (this.atKeyword('yield')) {
      this.yieldExpression();
      this.expectOp(')');
      return other(start, 'yield expression');
    }
    const first = this.starNamedExpression();
    if (this.atComprehension()) {
      this.comprehensionClauses();
      this.expectOp(')');
      return other(start, 'generator expression');
    }
    if (this.acceptOp(')')) {
      if (first.kind === 'starred') this.fail(first.start, 'cannot use starred expression here');
      return first;
    }
    const elements = [first];
    while (this.acceptOp(',')) {
      if (this.atOp(')')) break;
      elements.push(this.starNamedExpression());
    }
    this.expectOp(')');
    return { kind: 'tuple', start, elements };
  }

  private bracketed(): Expr {
    const start = this.expectOp('[');
    if (this.acceptOp(']')) return { kind: 'list', start, elements: [] };
    const first = this.starNamedExpression();
    if (this.atComprehension()) {
      this.comprehensionClauses();
      this.expectOp(']');
      return other(start, 'list comprehension');
    }
    const elements = [first];
    while (this.acceptOp(',')) {
      if (this.atOp(']')) break;
      elements.push(this.starNamedExpression());
    }
    this.expectOp(']');
    return { kind: 'list', start, elements };
  }

  private braced(): Expr {
    const start = this.expectOp('{');
    if (this.acceptOp('}')) return other(start, 'dict literal');

    if (this.atOp('**')) {
      this.dictEntries();
      return other(start, 'dict literal');
    }
    if (this.atOp('*')) {
      this.setElements();
      return other(start, 'set display');
    }

    this.namedExpression();
    if (this.acceptOp(':')) {
      this.expression();
      if (this.atComprehension()) {
        this.comprehensionClauses();
        this.expectOp('}');
        return other(start, 'dict comprehension');
      }
      if (this.acceptOp(',')) {
        this.dictEntries();
      } else {
        this.expectOp('}');
      }
      return other(start, 'dict literal');
    }
    if (this.atComprehension()) {
      this.comprehensionClauses();
      this.expectOp('}');
      return other(start, 'set comprehension');
    }
    if (this.acceptOp(',')) {
      this.setElements();
    } else {
      this.expectOp('}');
    }
    return other(start, 'set display');
  }

  // Remaining `key: value` or `**mapping` entries, through the closing brace.
  private dictEntries(): void {
    while (!this.atOp('}')) {
      if (this.acceptOp('**')) {
        this.bitwiseOr();
      } else {
        this.expression();
        this.expectOp(':');
        this.expression();
      }
      if (!this.acceptOp(',')) break;
    }
    this.expectOp('}');
  }

  private setElements(): void {
    while (!this.atOp('}')) {
      this.starNamedExpression();
      if (!this.acceptOp(',')) break;
    }
    this.expectOp('}');
  }
}

/**
 * Rejects source the language itself would not compile to a syntax tree.
 * Throws ParseError with the 1-based line and column of the first problem.
 */
export function validatePythonSyntax(text: string): void {
  new SyntaxValidator(tokenizePython(text)).validate();
}
