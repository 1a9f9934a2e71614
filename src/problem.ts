import type { Atom, DomainDocument, Formula, InitLiteral, ObjectGroup, ProblemDocument, TypeDeclaration } from "./types";
import { EncodingValidationError } from "./errors";
import { atom, atomsOf, isSubtype, not } from "./domain";

/**
 * Collects objects, initial facts and a goal for one problem instance of
 * `domain`, and assembles them into an immutable {@link ProblemDocument}
 * once everything they reference is declared.
 *
 * @example
 * ```ts
 * const problem = new ProblemBuilder(domain, "crossing")
 *   .addObjects("gridcell", ["pt0pt0", "pt1pt0"])
 *   .addFact("blocked", "pt1pt0", "0")
 *   .setGoal(atom("at", "pt0pt0", "1", "agent1"))
 *   .build();
 * ```
 */
export class ProblemBuilder {
  private readonly _objects: ObjectGroup[] = [];
  private readonly _init: InitLiteral[] = [];
  private _goal: Formula | undefined;

  constructor(
    readonly domain: DomainDocument,
    readonly name: string
  ) {
    if (name === "") {
      throw new TypeError("Problem name must not be empty.");
    }
  }

  /** Declares `names` as objects of `type`. Groups keep insertion order. */
  addObjects(type: string, names: ReadonlyArray<string>): this {
    if (names.length > 0) {
      this._objects.push({ type, names: [...names] });
    }
    return this;
  }

  addFact(predicate: string, ...args: string[]): this {
    this._init.push(atom(predicate, ...args));
    return this;
  }

  addFacts(facts: Iterable<InitLiteral>): this {
    for (const fact of facts) {
      this._init.push(fact);
    }
    return this;
  }

  /** Adds an explicit `(not (predicate args…))` to the initial state. */
  addNegatedFact(predicate: string, ...args: string[]): this {
    this._init.push(not(atom(predicate, ...args)));
    return this;
  }

  setGoal(goal: Formula): this {
    this._goal = goal;
    return this;
  }

  /**
   * Validates and returns the finished document: a goal must be set, object
   * names must be unique and typed with declared types, the domain's
   * required objects must be present, and every fact and goal atom must use
   * a declared predicate with the right arity and well-typed objects.
   *
   * @throws {EncodingValidationError} on the first problem found.
   */
  build(): ProblemDocument {
    const goal = this._goal;
    if (goal === undefined) {
      throw new EncodingValidationError(this.name, "no goal has been set");
    }

    const types = new Map<string, TypeDeclaration>(this.domain.types.map((t) => [t.name, t]));
    const objectTypes = new Map<string, string>();
    for (const group of this._objects) {
      if (!types.has(group.type)) {
        throw new EncodingValidationError(group.type, "objects are declared with an undeclared type");
      }
      for (const object of group.names) {
        if (objectTypes.has(object)) {
          throw new EncodingValidationError(object, "object is declared more than once");
        }
        objectTypes.set(object, group.type);
      }
    }

    for (const required of this.domain.requiredObjects) {
      const declared = objectTypes.get(required.name);
      if (declared === undefined || !isSubtype(declared, required.type, types)) {
        throw new EncodingValidationError(
          required.name,
          `domain "${this.domain.name}" requires an object of type "${required.type}"`
        );
      }
    }

    const predicates = new Map(this.domain.predicates.map((p) => [p.name, p]));
    const checkAtom = (fact: Atom): void => {
      const predicate = predicates.get(fact.predicate);
      if (predicate === undefined) {
        throw new EncodingValidationError(fact.predicate, "predicate is not declared in the domain");
      }
      if (predicate.parameters.length !== fact.args.length) {
        throw new EncodingValidationError(
          fact.predicate,
          `expects ${predicate.parameters.length} argument(s), got ${fact.args.length} (${fact.args.join(" ")})`
        );
      }
      fact.args.forEach((arg, i) => {
        const argType = objectTypes.get(arg);
        if (argType === undefined) {
          throw new EncodingValidationError(arg, `object used in "${fact.predicate}" is not declared`);
        }
        const expected = predicate.parameters[i].type;
        if (!isSubtype(argType, expected, types)) {
          throw new EncodingValidationError(arg, `has type "${argType}" but "${fact.predicate}" expects "${expected}"`);
        }
      });
    };

    for (const literal of this._init) {
      checkAtom(literal.type === "atom" ? literal : literal.operand);
    }
    for (const goalAtom of atomsOf(goal)) {
      checkAtom(goalAtom);
    }

    return Object.freeze({
      name: this.name,
      domain: this.domain.name,
      objects: Object.freeze([...this._objects]),
      init: Object.freeze([...this._init]),
      goal,
    });
  }
}
