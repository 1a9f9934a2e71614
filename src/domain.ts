import type {
  ActionSchema,
  Atom,
  Conjunction,
  Disjunction,
  DomainDocument,
  Formula,
  Negation,
  Parameter,
  PredicateDeclaration,
  RequiredObject,
  TypeDeclaration,
} from "./types";
import { EncodingValidationError } from "./errors";

/** Requirements emitted unless the builder is told otherwise. */
export const DEFAULT_REQUIREMENTS: ReadonlyArray<string> = [
  ":strips",
  ":typing",
  ":negative-preconditions",
  ":disjunctive-preconditions",
];

// ── Formula constructors ─────────────────────────────────────────────────────

export function atom(predicate: string, ...args: string[]): Atom {
  return { type: "atom", predicate, args };
}

export function not<TOperand extends Formula>(operand: TOperand): Negation<TOperand> {
  return { type: "not", operand };
}

export function and(...operands: Formula[]): Conjunction {
  return { type: "and", operands };
}

export function or(...operands: Formula[]): Disjunction {
  return { type: "or", operands };
}

/** Every atom of a formula, depth first. */
export function atomsOf(formula: Formula): Atom[] {
  switch (formula.type) {
    case "atom":
      return [formula];
    case "not":
      return atomsOf(formula.operand);
    case "and":
    case "or":
      return formula.operands.flatMap(atomsOf);
  }
}

/**
 * True when `type` equals `ancestor` or descends from it through the
 * `parent` links of `types`.
 */
export function isSubtype(
  type: string,
  ancestor: string,
  types: ReadonlyMap<string, TypeDeclaration>
): boolean {
  const seen = new Set<string>();
  let current: string | undefined = type;
  while (current !== undefined && !seen.has(current)) {
    if (current === ancestor) {
      return true;
    }
    seen.add(current);
    current = types.get(current)?.parent;
  }
  return false;
}

// ── DomainBuilder ────────────────────────────────────────────────────────────

/**
 * Collects types, predicates and action schemas in any order and assembles
 * them into an immutable {@link DomainDocument}.
 *
 * @example
 * ```ts
 * const domain = new DomainBuilder("grid_world")
 *   .addType("gridcell")
 *   .addPredicate("blocked", [{ name: "pt", type: "gridcell" }])
 *   .build();
 * ```
 */
export class DomainBuilder {
  private readonly _types = new Map<string, TypeDeclaration>();
  private readonly _predicates = new Map<string, PredicateDeclaration>();
  private readonly _actions = new Map<string, ActionSchema>();
  private readonly _requiredObjects = new Map<string, RequiredObject>();
  private _requirements: ReadonlyArray<string> = DEFAULT_REQUIREMENTS;

  constructor(readonly name: string) {
    if (name === "") {
      throw new TypeError("Domain name must not be empty.");
    }
  }

  /** Replaces the requirement flags, e.g. `[":strips", ":typing"]`. */
  setRequirements(requirements: ReadonlyArray<string>): this {
    this._requirements = [...requirements];
    return this;
  }

  /**
   * Declares a type. Redeclaring a name replaces it.
   *
   * @throws {TypeError} if `name` is empty.
   */
  addType(name: string, parent?: string): this {
    if (name === "") {
      throw new TypeError("Type name must not be empty.");
    }
    this._types.set(name, parent === undefined ? { name } : { name, parent });
    return this;
  }

  addPredicate(name: string, parameters: ReadonlyArray<Parameter>): this {
    if (name === "") {
      throw new TypeError("Predicate name must not be empty.");
    }
    this._predicates.set(name, { name, parameters: [...parameters] });
    return this;
  }

  addAction(action: ActionSchema): this {
    if (action.name === "") {
      throw new TypeError("Action name must not be empty.");
    }
    this._actions.set(action.name, action);
    return this;
  }

  /**
   * Declares an object the action schemas refer to by name. Problems built
   * against this domain must declare it.
   */
  requireObject(name: string, type: string): this {
    this._requiredObjects.set(name, { name, type });
    return this;
  }

  /**
   * Checks that everything referenced is declared: type parents, parameter
   * types, predicates used in actions (with matching arity and compatible
   * argument types), action variables and named objects.
   *
   * @throws {EncodingValidationError} on the first unresolved reference.
   * @returns `this` for fluent chaining.
   */
  validate(): this {
    for (const type of this._types.values()) {
      if (type.parent !== undefined && !this._types.has(type.parent)) {
        throw new EncodingValidationError(type.name, `supertype "${type.parent}" is not declared`);
      }
      if (type.parent !== undefined && isSubtype(type.parent, type.name, this._types)) {
        throw new EncodingValidationError(type.name, "type hierarchy is cyclic");
      }
    }

    const checkParameters = (owner: string, parameters: ReadonlyArray<Parameter>): void => {
      for (const parameter of parameters) {
        if (!this._types.has(parameter.type)) {
          throw new EncodingValidationError(owner, `parameter ?${parameter.name} has undeclared type "${parameter.type}"`);
        }
      }
    };

    for (const predicate of this._predicates.values()) {
      checkParameters(predicate.name, predicate.parameters);
    }
    for (const object of this._requiredObjects.values()) {
      if (!this._types.has(object.type)) {
        throw new EncodingValidationError(object.name, `has undeclared type "${object.type}"`);
      }
    }

    for (const action of this._actions.values()) {
      checkParameters(action.name, action.parameters);
      const variables = new Map(action.parameters.map((p) => [`?${p.name}`, p.type]));
      const formulas = [...atomsOf(action.precondition), ...atomsOf(action.effect)];
      for (const used of formulas) {
        const predicate = this._predicates.get(used.predicate);
        if (predicate === undefined) {
          throw new EncodingValidationError(action.name, `uses undeclared predicate "${used.predicate}"`);
        }
        if (predicate.parameters.length !== used.args.length) {
          throw new EncodingValidationError(
            action.name,
            `passes ${used.args.length} argument(s) to "${used.predicate}", which takes ${predicate.parameters.length}`
          );
        }
        used.args.forEach((arg, i) => {
          const argType = arg.startsWith("?") ? variables.get(arg) : this._requiredObjects.get(arg)?.type;
          if (argType === undefined) {
            throw new EncodingValidationError(action.name, `refers to undeclared "${arg}"`);
          }
          const expected = predicate.parameters[i].type;
          if (!isSubtype(argType, expected, this._types)) {
            throw new EncodingValidationError(
              action.name,
              `passes "${arg}" of type "${argType}" where "${used.predicate}" expects "${expected}"`
            );
          }
        });
      }
    }
    return this;
  }

  /**
   * Validates and returns the finished document.
   *
   * @throws {EncodingValidationError} see {@link DomainBuilder.validate}.
   */
  build(): DomainDocument {
    this.validate();
    return Object.freeze({
      name: this.name,
      requirements: Object.freeze([...this._requirements]),
      types: Object.freeze([...this._types.values()]),
      predicates: Object.freeze([...this._predicates.values()]),
      actions: Object.freeze([...this._actions.values()]),
      requiredObjects: Object.freeze([...this._requiredObjects.values()]),
    });
  }
}
