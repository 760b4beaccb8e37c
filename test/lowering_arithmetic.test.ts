import { describe, expect, it } from 'vitest';

import { traceFromAsm } from './helpers/hack_machine.js';
import { asmFor, machineFor, vm } from './helpers/translate.js';

function runStack(...lines: string[]) {
  const machine = machineFor(vm(...lines));
  expect(machine.run()).toBe(true);
  return machine;
}

describe('arithmetic and logical lowering', () => {
  it('emits the exact push/push/add sequence', () => {
    expect(asmFor(vm('push constant 7', 'push constant 8', 'add'))).toBe(
      [
        '// push constant 7',
        '@7',
        'D=A',
        '@SP',
        'A=M',
        'M=D',
        '@SP',
        'M=M+1',
        '// push constant 8',
        '@8',
        'D=A',
        '@SP',
        'A=M',
        'M=D',
        '@SP',
        'M=M+1',
        '// add',
        '@SP',
        'AM=M-1',
        'D=M',
        '@SP',
        'AM=M-1',
        'M=D+M',
        '@SP',
        'M=M+1',
        '// halt',
        '($HALT)',
        '@$HALT',
        '0;JMP',
        '',
      ].join('\n'),
    );
  });

  it('leaves 15 on top for 7 + 8 with SP one above its start', () => {
    const m = runStack('push constant 7', 'push constant 8', 'add');
    expect(m.peek()).toBe(15);
    expect(m.sp).toBe(257);
  });

  it('computes binary operators with x below y', () => {
    expect(runStack('push constant 7', 'push constant 2', 'sub').peek()).toBe(5);
    expect(runStack('push constant 2', 'push constant 7', 'sub').peek()).toBe(-5);
    expect(runStack('push constant 44', 'push constant 26', 'and').peek()).toBe(8);
    expect(runStack('push constant 44', 'push constant 26', 'or').peek()).toBe(62);
  });

  it('mutates the top of stack in place for unary operators', () => {
    const neg = runStack('push constant 5', 'neg');
    expect(neg.peek()).toBe(-5);
    expect(neg.sp).toBe(257);
    expect(runStack('push constant 0', 'not').peek()).toBe(-1);
    expect(runStack('push constant 5', 'not').peek()).toBe(-6);
  });

  it('pushes -1 for true and 0 for false from comparisons', () => {
    expect(runStack('push constant 41', 'push constant 41', 'eq').peek()).toBe(-1);
    expect(runStack('push constant 41', 'push constant 40', 'eq').peek()).toBe(0);
    expect(runStack('push constant 630', 'push constant 629', 'gt').peek()).toBe(-1);
    expect(runStack('push constant 629', 'push constant 630', 'gt').peek()).toBe(0);
    expect(runStack('push constant 629', 'push constant 630', 'lt').peek()).toBe(-1);
    expect(runStack('push constant 630', 'push constant 630', 'lt').peek()).toBe(0);

    const m = runStack('push constant 3', 'push constant 4', 'lt');
    expect(m.sp).toBe(257);
  });

  it('compares negative operands by sign', () => {
    const m = runStack('push constant 3', 'neg', 'push constant 2', 'lt');
    expect(m.peek()).toBe(-1);
  });

  it('gives every comparison its own labels', () => {
    const asm = asmFor(vm('push constant 1', 'push constant 1', 'eq', 'push constant 1', 'eq'));
    const labels = traceFromAsm(asm)
      .trace.filter((e) => e.kind === 'label')
      .map((e) => (e.kind === 'label' ? e.name : ''));
    expect(labels).toEqual([
      '$CMP_TRUE.0',
      '$CMP_END.0',
      '$CMP_TRUE.1',
      '$CMP_END.1',
      '$HALT',
    ]);

    const m = machineFor(vm('push constant 1', 'push constant 1', 'eq', 'push constant 1', 'eq'));
    m.run();
    // (1 == 1) is -1, and -1 == 1 is false
    expect(m.peek()).toBe(0);
    expect(m.sp).toBe(257);
  });

  it('evaluates a mixed expression', () => {
    // (10 + 4) - (3 and 6) = 14 - 2
    const m = runStack(
      'push constant 10',
      'push constant 4',
      'add',
      'push constant 3',
      'push constant 6',
      'and',
      'sub',
    );
    expect(m.peek()).toBe(12);
    expect(m.sp).toBe(257);
  });
});
