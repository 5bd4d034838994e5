import { RuntimeContext } from '../../src/function/context.js';

// Empty input greets the world; trailing newlines from the caller are dropped.
export function hello(_ctx: RuntimeContext, input: string): string {
  return `Hello ${input === '' ? 'world' : input.replace(/\n+$/, '')}!`;
}
