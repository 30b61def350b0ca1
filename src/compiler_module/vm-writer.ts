import { ArithmeticCommand, Segment } from '../types';

/**
 * Collects VM instructions as text lines, one instruction per line.
 */
export class VmWriter {
  private lines: string[] = [];

  writePush(segment: Segment, index: number) {
    this.lines.push(`push ${segment} ${index}`);
  }

  writePop(segment: Segment, index: number) {
    this.lines.push(`pop ${segment} ${index}`);
  }

  writeArithmetic(command: ArithmeticCommand) {
    this.lines.push(command);
  }

  writeLabel(label: string) {
    this.lines.push(`label ${label}`);
  }

  writeGoto(label: string) {
    this.lines.push(`goto ${label}`);
  }

  writeIfGoto(label: string) {
    this.lines.push(`if-goto ${label}`);
  }

  writeCall(name: string, nArgs: number) {
    this.lines.push(`call ${name} ${nArgs}`);
  }

  writeFunction(name: string, nLocals: number) {
    this.lines.push(`function ${name} ${nLocals}`);
  }

  writeReturn() {
    this.lines.push('return');
  }

  getLines(): string[] {
    return this.lines;
  }
}
