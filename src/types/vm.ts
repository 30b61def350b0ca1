/**
 * Stack-machine instruction vocabulary
 */
export type Segment =
  | 'argument'
  | 'local'
  | 'static'
  | 'constant'
  | 'this'
  | 'that'
  | 'pointer'
  | 'temp';

export type ArithmeticCommand =
  | 'add'
  | 'sub'
  | 'neg'
  | 'eq'
  | 'gt'
  | 'lt'
  | 'and'
  | 'or'
  | 'not';

// Runtime library entry points the generated code calls into
export const OS_MEMORY_ALLOC = 'Memory.alloc';
export const OS_MATH_MULTIPLY = 'Math.multiply';
export const OS_MATH_DIVIDE = 'Math.divide';
export const OS_STRING_NEW = 'String.new';
export const OS_STRING_APPEND_CHAR = 'String.appendChar';
