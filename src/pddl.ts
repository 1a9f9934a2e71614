import type {
  ActionSchema,
  DomainDocument,
  Formula,
  Parameter,
  PredicateDeclaration,
  ProblemDocument,
  TypeDeclaration,
} from "./types";

const INDENT = "  ";

function formatParameters(parameters: ReadonlyArray<Parameter>): string {
  return parameters.map((p) => `?${p.name} - ${p.type}`).join(" ");
}

/** Renders a formula as a single s-expression. */
export function formatFormula(formula: Formula): string {
  switch (formula.type) {
    case "atom":
      return formula.args.length === 0
        ? `(${formula.predicate})`
        : `(${formula.predicate} ${formula.args.join(" ")})`;
    case "not":
      return `(not ${formatFormula(formula.operand)})`;
    case "and":
    case "or":
      return `(${formula.type} ${formula.operands.map(formatFormula).join(" ")})`;
  }
}

function formatType(type: TypeDeclaration): string {
  return type.parent === undefined ? type.name : `${type.name} - ${type.parent}`;
}

function formatPredicate(predicate: PredicateDeclaration): string {
  return predicate.parameters.length === 0
    ? `(${predicate.name})`
    : `(${predicate.name} ${formatParameters(predicate.parameters)})`;
}

function formatAction(action: ActionSchema): string {
  return [
    `${INDENT}(:action ${action.name}`,
    `${INDENT}${INDENT}:parameters (${formatParameters(action.parameters)})`,
    `${INDENT}${INDENT}:precondition ${formatFormula(action.precondition)}`,
    `${INDENT}${INDENT}:effect ${formatFormula(action.effect)}`,
    `${INDENT})`,
  ].join("\n");
}

/** Renders a domain document as PDDL text, newline-terminated. */
export function serializeDomain(domain: DomainDocument): string {
  const lines = [`(define (domain ${domain.name})`];
  if (domain.requirements.length > 0) {
    lines.push(`${INDENT}(:requirements ${domain.requirements.join(" ")})`);
  }
  if (domain.types.length > 0) {
    lines.push(`${INDENT}(:types`);
    for (const type of domain.types) {
      lines.push(`${INDENT}${INDENT}${formatType(type)}`);
    }
    lines.push(`${INDENT})`);
  }
  lines.push(`${INDENT}(:predicates`);
  for (const predicate of domain.predicates) {
    lines.push(`${INDENT}${INDENT}${formatPredicate(predicate)}`);
  }
  lines.push(`${INDENT})`);
  for (const action of domain.actions) {
    lines.push(formatAction(action));
  }
  lines.push(")");
  return lines.join("\n") + "\n";
}

/**
 * Renders a problem document as PDDL text, newline-terminated. Each object
 * group and each initial fact goes on its own line.
 */
export function serializeProblem(problem: ProblemDocument): string {
  const lines = [`(define (problem ${problem.name})`, `${INDENT}(:domain ${problem.domain})`];
  lines.push(`${INDENT}(:objects`);
  for (const group of problem.objects) {
    lines.push(`${INDENT}${INDENT}${group.names.join(" ")} - ${group.type}`);
  }
  lines.push(`${INDENT})`);
  lines.push(`${INDENT}(:init`);
  for (const fact of problem.init) {
    lines.push(`${INDENT}${INDENT}${formatFormula(fact)}`);
  }
  lines.push(`${INDENT})`);
  lines.push(`${INDENT}(:goal ${formatFormula(problem.goal)})`);
  lines.push(")");
  return lines.join("\n") + "\n";
}
