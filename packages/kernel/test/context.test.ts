import { describe, it, expect } from 'vitest';
import { createContext, describeContext } from '../src/index.js';

describe('createContext', () => {
  it('normalizes tags and sorts requested documents', () => {
    const context = createContext({
      identifier: 'src/App.tsx',
      language: ' TypeScript ',
      frameworkSignals: ['React', 'react', ' '],
      include: ['zeta', 'alpha', 'zeta', ''],
    });

    expect(describeContext(context)).toEqual({
      identifier: 'src/App.tsx',
      language: 'typescript',
      frameworkSignals: ['react'],
      include: ['alpha', 'zeta'],
    });
  });

  it('returns an immutable context', () => {
    const context = createContext({ identifier: 'a.py', language: 'python', frameworkSignals: ['django'] });

    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.include)).toBe(true);
    const signals = context.frameworkSignals;
    if (!(signals instanceof Set)) throw new Error('expected a Set');
    expect(() => signals.add('flask')).toThrow(TypeError);
    expect(signals.has('flask')).toBe(false);
  });
});
