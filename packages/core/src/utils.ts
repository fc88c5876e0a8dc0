export type Verb = 'get' | 'post' | 'put';

export function unreachable(msg: string): never {
  throw new Error(`${msg} is unreachable`);
}
