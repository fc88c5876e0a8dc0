import type { Verb } from './utils.ts';

export type ChangeSafety =
  | {
      access: 'readonly';
    }
  | {
      access: 'update';
      idempotent: boolean;
    };

export class HttpVerb {
  readonly verb: Verb;
  readonly change: ChangeSafety;

  constructor(verb: Verb, change: ChangeSafety) {
    this.verb = verb;
    this.change = change;
  }

  get uppercase(): string {
    return this.verb.toUpperCase();
  }

  describe(): string {
    const { change } = this;

    switch (change.access) {
      case 'readonly':
        return 'readonly';
      case 'update':
        return change.idempotent ? 'idempotent update' : 'update';
    }
  }
}

export function getSafety(verb: Verb): ChangeSafety {
  switch (verb) {
    case 'get':
      return { access: 'readonly' };
    case 'put':
      return { access: 'update', idempotent: true };
    case 'post':
      return { access: 'update', idempotent: false };
  }
}
