import { applyExclusions } from '../request/exclusivity.ts';
import type { DroppedField } from '../request/exclusivity.ts';
import { normalizeFields } from '../request/normalizers.ts';
import type { NormalizeOptions } from '../request/normalizers.ts';
import { bucketArgs } from '../request/request-utils.ts';
import type { ArgumentBag, BucketedArgs, NormalizedParameterSet } from '../request/request-utils.ts';
import { templateVariables } from '../request/template-utils.ts';
import { HttpVerb, getSafety } from '../safety.ts';

import { OPERATIONS } from './catalog.ts';
import type { OperationKind, OperationSpec } from './catalog.ts';
import { pathField } from './fields.ts';
import type { FieldLocation, FieldSpec } from './fields.ts';

export interface NormalizedArgs {
  params: NormalizedParameterSet;
  dropped: DroppedField[];
}

/**
 * A row of the operation table together with the behaviour that can be
 * derived from it alone:
 *
 * - path fields are read off the path template and always required
 * - `normalize` runs the field normalizers, then the exclusivity rules
 * - `bucketArgs` splits the result into path, query and body
 */
export class MentionOperation {
  static from(kind: OperationKind): MentionOperation {
    const spec = OPERATIONS[kind];
    return new MentionOperation(new HttpVerb(spec.method, getSafety(spec.method)), spec);
  }

  readonly verb: HttpVerb;
  readonly spec: OperationSpec;
  readonly fields: readonly FieldSpec[];

  readonly #locations: ReadonlyMap<string, FieldLocation>;

  constructor(verb: HttpVerb, spec: OperationSpec) {
    this.verb = verb;
    this.spec = spec;
    this.fields = [...templateVariables(spec.path).map(pathField), ...spec.fields];
    this.#locations = new Map(this.fields.map((field) => [field.name, field.location]));
  }

  get kind(): OperationKind {
    return this.spec.kind;
  }

  get path(): string {
    return this.spec.path;
  }

  get pathFields(): string[] {
    return this.fields.filter((field) => field.location === 'path').map((field) => field.name);
  }

  /**
   * Whether the operation sends a JSON document. Operations without body
   * fields send no body at all, even when the verb would allow one.
   */
  get hasBody(): boolean {
    return this.spec.fields.some((field) => field.location === 'body');
  }

  get description(): string {
    return this.spec.summary;
  }

  describe(): string {
    return `${this.verb.uppercase} ${this.path}`;
  }

  locationOf(name: string): FieldLocation | undefined {
    return this.#locations.get(name);
  }

  /**
   * @throws ValidationError when any field fails to normalize
   */
  normalize(args: ArgumentBag, options: NormalizeOptions): NormalizedArgs {
    const params = normalizeFields(this.fields, args, options);
    const dropped = applyExclusions(params, this.spec.exclusions);
    return { params, dropped };
  }

  bucketArgs(params: NormalizedParameterSet): BucketedArgs {
    return bucketArgs(this, params);
  }
}
