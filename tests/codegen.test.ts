import { JackCompiler } from '../src/index';
import { MalformedConstructError, UnresolvedIdentifierError } from '../src/types';

const compile = (code: string) => new JackCompiler().compile(code);

const inFunction = (body: string, declarations = '') =>
  compile(`class C { function void f() { ${declarations} ${body} return; } }`);

describe('Code generation', () => {
  it('compiles a do statement that prints an integer', () => {
    expect(compile('class Main { function void main() { do Output.printInt(1); return; } }')).toEqual([
      'function Main.main 0',
      'push constant 1',
      'call Output.printInt 1',
      'pop temp 0',
      'push constant 0',
      'return',
    ]);
  });

  it('allocates the object before the body of a constructor', () => {
    const lines = compile(`
      class V {
        field int x, y;
        field Array data;
        static int count;
        constructor V new(int n) { var int i; let x = n; return this; }
      }
    `);
    expect(lines).toEqual([
      'function V.new 1',
      'push constant 3',
      'call Memory.alloc 1',
      'pop pointer 0',
      'push argument 0',
      'pop this 0',
      'push pointer 0',
      'return',
    ]);
  });

  it('binds the receiver in a method and numbers parameters from 1', () => {
    expect(compile('class P { method int add(int a, int b) { return a + b; } }')).toEqual([
      'function P.add 0',
      'push argument 0',
      'pop pointer 0',
      'push argument 1',
      'push argument 2',
      'add',
      'return',
    ]);
  });

  it('counts every var name in the function header', () => {
    const [header] = compile('class C { function void f() { var int a, b; var char c; return; } }');
    expect(header).toBe('function C.f 3');
  });

  it('resolves a name declared as both field and local to the field', () => {
    expect(compile('class C { field int x; method int get() { var int x; let x = 5; return x; } }')).toEqual([
      'function C.get 1',
      'push argument 0',
      'pop pointer 0',
      'push constant 5',
      'pop this 0',
      'push this 0',
      'return',
    ]);
  });

  it('prefers locals over arguments, arguments over statics and fields over arguments', () => {
    const lines = compile(`
      class C {
        static int s, t;
        field int f;
        method void m(int s, int f, int v) {
          var int v;
          let v = 1;
          let s = 2;
          let f = 3;
          let t = 4;
          return;
        }
      }
    `);
    expect(lines).toEqual([
      'function C.m 1',
      'push argument 0',
      'pop pointer 0',
      'push constant 1',
      'pop local 0',
      'push constant 2',
      'pop argument 1',
      'push constant 3',
      'pop this 0',
      'push constant 4',
      'pop static 1',
      'push constant 0',
      'return',
    ]);
  });

  it('ends a let statement with one pop into the target', () => {
    const lines = compile('class C { static int s; function void f(int a) { var int v; let s = a; let v = s; let a = v; return; } }');
    expect(lines).toEqual([
      'function C.f 1',
      'push argument 0',
      'pop static 0',
      'push static 0',
      'pop local 0',
      'push local 0',
      'pop argument 0',
      'push constant 0',
      'return',
    ]);
  });

  it('does not compile a + b + c', () => {
    const result = new JackCompiler().tryCompile('class C { function int f(int a, int b, int c) { return a + b + c; } }');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('SYNTAX_ERROR');
    }
  });

  it('compiles a parenthesized chain left to right', () => {
    expect(compile('class C { function int f(int a, int b, int c) { return (a + b) + c; } }')).toEqual([
      'function C.f 0',
      'push argument 0',
      'push argument 1',
      'add',
      'push argument 2',
      'add',
      'return',
    ]);
  });

  it('gives every if and while in a class its own labels', () => {
    const lines = compile(`
      class C {
        function void f(boolean b) { if (b) { return; } return; }
        function void g(boolean b) { while (b) { let b = false; } return; }
      }
    `);
    expect(lines).toEqual([
      'function C.f 0',
      'push argument 0',
      'not',
      'if-goto C_1',
      'push constant 0',
      'return',
      'goto C_0',
      'label C_1',
      'label C_0',
      'push constant 0',
      'return',
      'function C.g 0',
      'label C_2',
      'push argument 0',
      'not',
      'if-goto C_3',
      'push constant 0',
      'pop argument 0',
      'goto C_2',
      'label C_3',
      'push constant 0',
      'return',
    ]);

    const labels = lines.filter((line) => line.startsWith('label ')).map((line) => line.slice('label '.length));
    expect(new Set(labels).size).toBe(labels.length);
  });

  it('compiles an else branch between the two labels', () => {
    expect(inFunction('if (x) { let x = 1; } else { let x = 2; }', 'var int x;')).toEqual([
      'function C.f 1',
      'push local 0',
      'not',
      'if-goto C_1',
      'push constant 1',
      'pop local 0',
      'goto C_0',
      'label C_1',
      'push constant 2',
      'pop local 0',
      'label C_0',
      'push constant 0',
      'return',
    ]);
  });

  it('reads and writes array elements through pointer 1', () => {
    expect(inFunction('let a[i] = a[0];', 'var Array a; var int i;')).toEqual([
      'function C.f 2',
      'push local 1',
      'push local 0',
      'add',
      'push constant 0',
      'push local 0',
      'add',
      'pop pointer 1',
      'push that 0',
      'pop temp 0',
      'pop pointer 1',
      'push temp 0',
      'pop that 0',
      'push constant 0',
      'return',
    ]);
  });

  it('pushes keyword constants', () => {
    expect(inFunction('let b = true; let b = false; let b = null;', 'var boolean b;').slice(1, 8)).toEqual([
      'push constant 1',
      'neg',
      'pop local 0',
      'push constant 0',
      'pop local 0',
      'push constant 0',
      'pop local 0',
    ]);
  });

  it('applies unary operators after their operand', () => {
    expect(inFunction('let x = -x; let x = ~x;', 'var int x;').slice(1, 7)).toEqual([
      'push local 0',
      'neg',
      'pop local 0',
      'push local 0',
      'not',
      'pop local 0',
    ]);
  });

  it('calls the runtime for multiplication and division', () => {
    expect(inFunction('let x = x * 3; let x = x / 2;', 'var int x;').slice(1, 9)).toEqual([
      'push local 0',
      'push constant 3',
      'call Math.multiply 2',
      'pop local 0',
      'push local 0',
      'push constant 2',
      'call Math.divide 2',
      'pop local 0',
    ]);
  });

  it('builds strings one UTF-8 byte at a time', () => {
    expect(inFunction('do Output.printString("é");').slice(1, 8)).toEqual([
      'push constant 2',
      'call String.new 1',
      'push constant 195',
      'call String.appendChar 2',
      'push constant 169',
      'call String.appendChar 2',
      'call Output.printString 1',
    ]);
  });

  it('passes an object variable as the receiver of a qualified call', () => {
    expect(inFunction('let p = Point.new(1, 2); do p.move(3);', 'var Point p;')).toEqual([
      'function C.f 1',
      'push constant 1',
      'push constant 2',
      'call Point.new 2',
      'pop local 0',
      'push local 0',
      'push constant 3',
      'call Point.move 2',
      'pop temp 0',
      'push constant 0',
      'return',
    ]);
  });

  it('passes the current object to an unqualified call', () => {
    const lines = compile('class C { method void f() { do g(1); return; } method void g(int a) { return; } }');
    expect(lines.slice(0, 9)).toEqual([
      'function C.f 0',
      'push argument 0',
      'pop pointer 0',
      'push pointer 0',
      'push constant 1',
      'call C.g 2',
      'pop temp 0',
      'push constant 0',
      'return',
    ]);
  });

  it('refuses a qualified call on a primitive variable', () => {
    expect(() => inFunction('do n.foo();', 'var int n;')).toThrow(MalformedConstructError);
    expect(() => inFunction('do n.foo();', 'var int n;')).toThrow(
      '[line 1] Cannot call "n.foo": "n" is not an object'
    );
  });

  it('reports a variable missing from every table', () => {
    expect(() => compile('class C { function int f() { return y; } }')).toThrow(UnresolvedIdentifierError);
    expect(() => compile('class C { function int f() { return y; } }')).toThrow(
      '[line 1] Could not find "y" in any symbol table'
    );
    expect(() => inFunction('let z = 1;')).toThrow('Could not find "z" in any symbol table');
  });

  it('traces where each name was found', () => {
    const trace = jest.fn();
    new JackCompiler({ trace }).compile(
      'class C { field int x; method void f() { let x = 1; do Output.printInt(x); return; } }'
    );
    expect(trace.mock.calls).toEqual([
      ['Found "x" in the class\'s field table'],
      ['"Output" is not a variable; calling it as a class'],
      ['Found "x" in the class\'s field table'],
    ]);
  });
});
