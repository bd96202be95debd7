/**
 * Name environment for generating one function body: the arena of names
 * declared so far, indexed by type, plus the set of mutable locals.
 */

import { GenerationError } from "../errors/index.ts";
import type { LocalId, Name, Type } from "../ir/ir-types/index.ts";
import { localName } from "../ir/program.ts";
import { typeKey } from "../ir/types.ts";
import type { Random } from "../random/rng.ts";

interface TypeBucket {
  type: Type;
  ids: LocalId[];
}

export class NameEnv {
  readonly names: Name[] = [];
  private readonly byType = new Map<string, TypeBucket>();
  private readonly mutable = new Set<LocalId>();

  /** Bind a fresh name of the given type. */
  declare(type: Type, mutable = false): Name {
    const id = this.names.length;
    const name: Name = { id, ident: localName(id), type };
    this.names.push(name);

    const key = typeKey(type);
    const bucket = this.byType.get(key);
    if (bucket) {
      bucket.ids.push(id);
    } else {
      this.byType.set(key, { type, ids: [id] });
    }
    if (mutable) this.mutable.add(id);
    return name;
  }

  name(id: LocalId): Name {
    const name = this.names[id];
    if (name === undefined) {
      throw new GenerationError(`no name with handle ${id}`);
    }
    return name;
  }

  typeOf(id: LocalId): Type {
    return this.name(id).type;
  }

  /** Names of exactly this type, in declaration order. */
  inhabitants(type: Type): readonly LocalId[] {
    return this.byType.get(typeKey(type))?.ids ?? [];
  }

  isInhabited(type: Type, atLeast = 1): boolean {
    return this.inhabitants(type).length >= atLeast;
  }

  /** Every inhabited type, in order of first declaration. */
  inhabitedTypes(): Type[] {
    return this.inhabitedTypesWhere((t): t is Type => true);
  }

  /** Inhabited types narrowed by `predicate`, in order of first declaration. */
  inhabitedTypesWhere<T extends Type>(predicate: (t: Type) => t is T): T[] {
    const out: T[] = [];
    for (const { type, ids } of this.byType.values()) {
      if (ids.length > 0 && predicate(type)) out.push(type);
    }
    return out;
  }

  /** Mutable locals, in declaration order. */
  mutableNames(): Name[] {
    return [...this.mutable].map((id) => this.name(id));
  }

  /** Uniformly chosen inhabitant of `type`, optionally excluding one handle. */
  pickInhabitant(rng: Random, type: Type, exclude?: LocalId): LocalId {
    const options = this.inhabitants(type).filter((id) => id !== exclude);
    if (options.length === 0) {
      throw new GenerationError(`type ${typeKey(type)} has no inhabitant to pick`);
    }
    return rng.pick(options);
  }
}
