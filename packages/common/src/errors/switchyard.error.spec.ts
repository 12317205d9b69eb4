import { describe, expect, it } from 'vitest';

import { LogicError, SwitchyardError } from './switchyard.error';

describe('SwitchyardError', () => {
  it('should name errors after their concrete class', () => {
    class ExampleError extends SwitchyardError {}

    expect(new ExampleError('x').name).toBe('ExampleError');
    expect(new LogicError('y').name).toBe('LogicError');
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    const error = new LogicError('wrapped', { cause });

    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(SwitchyardError);
  });
});
