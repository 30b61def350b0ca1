import { Lexer } from '../src/lexer';
import { Parser, parseTokens } from '../src/parser';
import { ASTNodeType, JackSyntaxError, Statement } from '../src/types';

const parse = (code: string) => new Parser(new Lexer(code).tokenize()).parse();

const statementsOf = (body: string): readonly Statement[] =>
  parse(`class T { function void f() { ${body} } }`).subroutineDecs[0].body.statements;

const letValue = (expression: string) => {
  const [statement] = statementsOf(`let x = ${expression};`);
  if (statement.type !== ASTNodeType.LET_STATEMENT) throw new Error('expected a let statement');
  return statement.value;
};

describe('Parser', () => {
  describe('declarations', () => {
    it('parses class variables and subroutines', () => {
      const ast = parse(`
        class A {
          static int s;
          field Point p, q;
          method void f(int a, char b) { var int x, y; return; }
        }
      `);

      expect(ast.name).toBe('A');
      expect(ast.classVarDecs).toMatchObject([
        { kind: 'static', varType: { type: ASTNodeType.PRIMITIVE_TYPE, name: 'int' }, names: ['s'] },
        { kind: 'field', varType: { type: ASTNodeType.CLASS_TYPE, name: 'Point' }, names: ['p', 'q'] },
      ]);

      const [method] = ast.subroutineDecs;
      expect(method).toMatchObject({ kind: 'method', returnType: 'void', name: 'f' });
      expect(method.parameters.map((parameter) => parameter.name)).toEqual(['a', 'b']);
      expect(method.body.varDecs[0].names).toEqual(['x', 'y']);
      expect(method.body.statements).toEqual([
        { type: ASTNodeType.RETURN_STATEMENT, value: null, line: 5 },
      ]);
    });

    it.each(['constructor', 'function', 'method'])('reads the %s subroutine kind', (kind) => {
      const [subroutine] = parse(`class A { ${kind} void f() { return; } }`).subroutineDecs;
      expect(subroutine.kind).toBe(kind);
    });

    it('parses a class-typed return type and an empty parameter list', () => {
      const [ctor] = parse('class P { constructor P new() { return this; } }').subroutineDecs;
      expect(ctor.kind).toBe('constructor');
      expect(ctor.returnType).toMatchObject({ type: ASTNodeType.CLASS_TYPE, name: 'P' });
      expect(ctor.parameters).toEqual([]);
    });

    it('rejects a class variable declared after a subroutine', () => {
      expect(() => parse('class A { function void f() { return; } field int x; }')).toThrow(
        'Expected SYMBOL "}", but got KEYWORD "field"'
      );
    });

    it('parses only the first class and leaves the rest unread', () => {
      const parser = new Parser(new Lexer('class A { } class B { }').tokenize());
      expect(parser.parse().name).toBe('A');
      expect(parser.peek()).toMatchObject({ value: 'class' });
      expect(parser.pos).toBe(4);
    });
  });

  describe('terms', () => {
    it('reads a bare identifier as a variable', () => {
      expect(letValue('a').term).toMatchObject({ type: ASTNodeType.VAR_NAME, name: 'a' });
    });

    it('reads identifier [ as an array element', () => {
      expect(letValue('a[1]').term).toMatchObject({
        type: ASTNodeType.ARRAY_ELEMENT,
        name: 'a',
        index: { term: { type: ASTNodeType.INTEGER_CONSTANT, value: 1 } },
      });
    });

    it('reads identifier ( as a call on the current object', () => {
      expect(letValue('f(1, 2)').term).toMatchObject({
        type: ASTNodeType.SUBROUTINE_CALL_TERM,
        call: { type: ASTNodeType.CALL, name: 'f' },
      });
    });

    it('reads identifier . as a qualified call', () => {
      expect(letValue('Foo.bar()').term).toMatchObject({
        type: ASTNodeType.SUBROUTINE_CALL_TERM,
        call: { type: ASTNodeType.CLASS_CALL, target: 'Foo', name: 'bar', args: [] },
      });
    });

    it('reads unary operators and keyword constants', () => {
      expect(letValue('-x').term).toMatchObject({
        type: ASTNodeType.UNARY_OPERATION,
        operator: '-',
        term: { type: ASTNodeType.VAR_NAME, name: 'x' },
      });
      expect(letValue('~true').term).toMatchObject({
        type: ASTNodeType.UNARY_OPERATION,
        operator: '~',
        term: { type: ASTNodeType.KEYWORD_CONSTANT, value: 'true' },
      });
    });

    it('reads string constants and parenthesized expressions', () => {
      expect(letValue('"hi"').term).toMatchObject({ type: ASTNodeType.STRING_CONSTANT, value: 'hi' });
      expect(letValue('(1)').term).toMatchObject({ type: ASTNodeType.PARENTHESIZED });
    });
  });

  describe('expressions', () => {
    it('keeps one operator and term after the head term', () => {
      const value = letValue('a * 2');
      expect(value.rest).toHaveLength(1);
      expect(value.rest[0]).toMatchObject({ operator: '*', term: { type: ASTNodeType.INTEGER_CONSTANT, value: 2 } });
    });

    it('stops after the first pair, so a + b + c fails at the second operator', () => {
      expect(() => letValue('a + b + c')).toThrow(JackSyntaxError);
      expect(() => letValue('a + b + c')).toThrow('[line 1] Expected SYMBOL ";", but got SYMBOL "+"');
    });

    it('accepts a chain once it is parenthesized', () => {
      const value = letValue('(a + b) + c');
      expect(value.term.type).toBe(ASTNodeType.PARENTHESIZED);
      expect(value.rest).toHaveLength(1);
    });

    it('applies the same limit inside argument lists', () => {
      expect(() => statementsOf('do f(a + b + c); return;')).toThrow('Expected SYMBOL ")", but got SYMBOL "+"');
    });
  });

  describe('statements', () => {
    it('parses let with an index, if/else, while and do', () => {
      const statements = statementsOf(`
        let a[i] = 0;
        if (x) { do g(); } else { let y = 1; }
        while (y) { let y = 0; }
        return y;
      `);
      expect(statements.map((statement) => statement.type)).toEqual([
        ASTNodeType.LET_STATEMENT,
        ASTNodeType.IF_STATEMENT,
        ASTNodeType.WHILE_STATEMENT,
        ASTNodeType.RETURN_STATEMENT,
      ]);
      expect(statements[0]).toMatchObject({ index: { type: ASTNodeType.EXPRESSION } });
      expect(statements[1]).toMatchObject({ thenBranch: [{ type: ASTNodeType.DO_STATEMENT }] });
    });

    it('requires a call after do', () => {
      expect(() => statementsOf('do x;')).toThrow('Expected SYMBOL "(", but got SYMBOL ";"');
    });
  });

  describe('parseTokens', () => {
    it('wraps the class in an Ok result', () => {
      const result = parseTokens(new Lexer('class A { }').tokenize());
      expect(result.ok).toBe(true);
    });

    it('reports the first invalid production as an Err', () => {
      const result = parseTokens(new Lexer('').tokenize());
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(JackSyntaxError);
        expect(result.error.message).toBe('[line 1] Expected KEYWORD "class", but got end of input');
      }
    });
  });
});
