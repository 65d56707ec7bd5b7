import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { BuiltinRegistry, createDefaultRegistry, type Builtin } from '../src/runtime/builtins';
import { createMemoryIO } from '../src/runtime/io';
import { DslTypeError } from '../src/dsl/errors';
import { RuntimeValueSchema, type RuntimeValue } from '../src/dsl/values';

const LEN: Builtin<RuntimeValue[]> = {
  name: 'len',
  description: 'Length of an array.',
  schema: z.array(RuntimeValueSchema),
  run: (_ctx, arg) => arg.length,
};

describe('createDefaultRegistry', () => {
  it('registers the default builtins', () => {
    expect(createDefaultRegistry(createMemoryIO()).names()).toEqual(['print', 'inpstr', 'inpnum', 'sqrt']);
  });

  it('lets host entries replace defaults of the same name', () => {
    const registry = createDefaultRegistry(createMemoryIO(), { print: () => 1, hello: () => 'hi' });
    expect(registry.names()).toEqual(['inpstr', 'inpnum', 'sqrt', 'print', 'hello']);
    expect(registry.get('print')?.invoke('x', 1)).toBe(1);
  });

  it('is frozen once built', () => {
    const registry = createDefaultRegistry(createMemoryIO());
    expect(() => registry.registerHost('extra', () => null)).toThrow('Builtin registry is frozen; cannot register: extra');
  });

  it('writes print output through the console', () => {
    const io = createMemoryIO();
    const registry = createDefaultRegistry(io);
    expect(registry.get('print')?.invoke(['a', 1, null], 1)).toBeNull();
    expect(io.output).toEqual(['["a", 1, none]']);
  });

  it('fails inpstr once input is exhausted', () => {
    const registry = createDefaultRegistry(createMemoryIO(['only']));
    expect(registry.get('inpstr')?.invoke(undefined, 1)).toBe('only');
    expect(() => registry.get('inpstr')?.invoke(undefined, 1)).toThrow('inpstr: end of input');
  });

  it('rejects blank numeric input', () => {
    const registry = createDefaultRegistry(createMemoryIO(['   ']));
    expect(() => registry.get('inpnum')?.invoke(undefined, 1)).toThrow('inpnum: could not convert input to a number: "   "');
  });
});

describe('BuiltinRegistry', () => {
  it('validates arguments against the builtin schema', () => {
    const registry = new BuiltinRegistry({ io: createMemoryIO() });
    registry.register(LEN);
    expect(registry.get('len')?.invoke([1, 2, 3], 1)).toBe(3);

    try {
      registry.get('len')?.invoke('abc', 4);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DslTypeError);
      if (!(e instanceof DslTypeError)) return;
      expect(e.line).toBe(4);
      expect(e.detail.startsWith("Invalid argument for builtin 'len': ")).toBe(true);
    }
  });

  it('refuses a second builtin with the same name', () => {
    const registry = new BuiltinRegistry({ io: createMemoryIO() });
    registry.register(LEN);
    expect(() => registry.register(LEN)).toThrow('Builtin already registered: len');
  });

  it('reports what it holds', () => {
    const registry = new BuiltinRegistry({ io: createMemoryIO() });
    registry.registerHost('twice', (v) => (typeof v === 'number' ? v * 2 : null), 'Double a number');
    expect(registry.has('twice')).toBe(true);
    expect(registry.has('len')).toBe(false);
    expect(registry.get('twice')?.description).toBe('Double a number');
    expect(registry.get('twice')?.invoke(21, 1)).toBe(42);
  });
});

describe('createMemoryIO', () => {
  it('hands out queued lines then null', () => {
    const io = createMemoryIO(['a', 'b']);
    expect(io.readLine()).toBe('a');
    expect(io.readLine()).toBe('b');
    expect(io.readLine()).toBeNull();
    expect(io.pending).toEqual([]);
  });
});
