import { describe, expect, it } from 'vitest';

import { asmFor, machineFor, vm } from './helpers/translate.js';

const plain = { haltLoop: false, comments: false } as const;

describe('function call lowering', () => {
  it('emits the exact call sequence', () => {
    const push = ['@SP', 'A=M', 'M=D', '@SP', 'M=M+1'];
    expect(asmFor(vm('call Util.pair 2'), plain).split('\n')).toEqual([
      '@$RET.0',
      'D=A',
      ...push,
      '@LCL',
      'D=M',
      ...push,
      '@ARG',
      'D=M',
      ...push,
      '@THIS',
      'D=M',
      ...push,
      '@THAT',
      'D=M',
      ...push,
      '@SP',
      'D=M',
      '@7',
      'D=D-A',
      '@ARG',
      'M=D',
      '@SP',
      'D=M',
      '@LCL',
      'M=D',
      '@Util.pair',
      '0;JMP',
      '($RET.0)',
      '',
    ]);
  });

  it('zero-initialises locals on function entry', () => {
    expect(asmFor(vm('function Util.zero 2'), plain).split('\n')).toEqual([
      '(Util.zero)',
      '@SP',
      'A=M',
      'M=0',
      '@SP',
      'M=M+1',
      '@SP',
      'A=M',
      'M=0',
      '@SP',
      'M=M+1',
      '',
    ]);

    const m = machineFor(vm('function Util.zero 2'));
    m.poke(256, 99, 98);
    m.run();
    expect([m.ram[256], m.ram[257]]).toEqual([0, 0]);
    expect(m.sp).toBe(258);
  });

  it('saves the caller frame and repositions ARG and LCL', () => {
    const m = machineFor(
      vm(
        'function Sys.init 0',
        'push constant 20',
        'push constant 7',
        'call Util.pair 2',
        'function Util.pair 0',
        'return',
      ),
    );
    expect(m.run({ until: 'Util.pair' })).toBe(true);

    expect(Array.from(m.ram.slice(256, 263))).toEqual([
      20,
      7,
      m.labels.get('$RET.0'),
      320,
      480,
      2048,
      2300,
    ]);
    expect(m.sp).toBe(263);
    expect(m.ram[1]).toBe(263);
    expect(m.ram[2]).toBe(256);
  });

  it('returns the value to the caller and restores its frame', () => {
    const m = machineFor(
      vm(
        'function Sys.init 0',
        'push constant 3030',
        'pop pointer 0',
        'push constant 3040',
        'pop pointer 1',
        'push constant 20',
        'push constant 7',
        'call Util.diff 2',
        'label STOP',
        'goto STOP',
        'function Util.diff 1',
        'push argument 0',
        'push argument 1',
        'sub',
        'pop local 0',
        'push constant 5000',
        'pop pointer 0',
        'push local 0',
        'return',
      ),
    );
    expect(m.run({ until: 'Sys.init$STOP' })).toBe(true);

    expect(m.ram[256]).toBe(13);
    expect(m.sp).toBe(257);
    expect([m.ram[1], m.ram[2], m.ram[3], m.ram[4]]).toEqual([320, 480, 3030, 3040]);
  });

  it('returns from a function called with no arguments', () => {
    const m = machineFor(
      vm(
        'function Sys.init 0',
        'call Util.seven 0',
        'label STOP',
        'goto STOP',
        'function Util.seven 0',
        'push constant 7',
        'return',
      ),
    );
    expect(m.run({ until: 'Sys.init$STOP' })).toBe(true);
    expect(m.ram[256]).toBe(7);
    expect(m.sp).toBe(257);
  });

  it('supports recursion', () => {
    const m = machineFor([
      {
        path: 'Sys.vm',
        text: vm(
          'function Sys.init 0',
          'push constant 6',
          'call Sum.upTo 1',
          'label STOP',
          'goto STOP',
        ),
      },
      {
        path: 'Sum.vm',
        text: vm(
          '// upTo(n) = n + upTo(n - 1), upTo(0) = 0',
          'function Sum.upTo 0',
          'push argument 0',
          'if-goto REC',
          'push constant 0',
          'return',
          'label REC',
          'push argument 0',
          'push argument 0',
          'push constant 1',
          'sub',
          'call Sum.upTo 1',
          'add',
          'return',
        ),
      },
    ]);
    expect(m.run({ until: 'Sys.init$STOP' })).toBe(true);
    expect(m.ram[256]).toBe(21);
    expect(m.sp).toBe(257);
    expect([m.ram[1], m.ram[2], m.ram[3], m.ram[4]]).toEqual([320, 480, 2048, 2300]);
  });

  it('numbers return labels from the shared counter', () => {
    const asm = asmFor(vm('push constant 1', 'push constant 2', 'lt', 'call A.f 0', 'call A.f 0'));
    expect(asm).toContain('($CMP_TRUE.0)\n');
    expect(asm).toContain('($RET.1)\n');
    expect(asm).toContain('($RET.2)\n');
  });
});
