/**
 * Logic stages for formalized reconstructions.
 *
 * Each stage reads the formalizations the `flawed-formalization` dimension
 * left in the context's side cache for the same record and asks the prover
 * about them. Without a usable cache a stage records nothing.
 */

import { argumentName, inferenceRefs, isConclusion } from '../artifacts/graph.js';
import { negate } from '../logic/formula.js';
import { sharedFormalizations, type FormalizationCache } from '../logic/formalizations.js';
import type { NamedFormula } from '../logic/smtlib.js';
import { checkValidity, describeFault, type ValidityOutcome } from '../logic/validity.js';
import type { ITheoremProver } from '../providers/ITheoremProver.js';
import type { Argument, ArgumentGraph, PcsItem } from '../types/models.js';
import type { CheckResult, GraphRecord } from '../types/verification.js';
import type { VerificationContext } from '../verification/VerificationContext.js';
import { GraphHandler, type RecordHandlerOptions } from './RecordHandler.js';

export interface LogicStageOptions extends RecordHandlerOptions {
  prover: ITheoremProver;
  fromKey?: string;
}

abstract class LogicStageHandler extends GraphHandler {
  protected readonly prover: ITheoremProver;
  protected readonly fromKey: string;

  constructor(checkId: string, opts: LogicStageOptions) {
    super(checkId, opts);
    this.prover = opts.prover;
    this.fromKey = opts.fromKey ?? 'from';
  }

  protected async evaluate(
    record: GraphRecord,
    graph: ArgumentGraph,
    ctx: VerificationContext
  ): Promise<CheckResult[]> {
    const cache = sharedFormalizations(ctx.artifacts, record.id);
    if (!cache || cache.isEmpty) return [];

    const messages = await this.inspect(graph, cache);
    return [
      {
        checkId: this.name,
        artifactRefs: [record.id],
        isValid: messages.length === 0,
        message: messages.length > 0 ? messages.join(' ') : null,
        details: {},
      },
    ];
  }

  protected abstract inspect(graph: ArgumentGraph, cache: FormalizationCache): Promise<string[]>;

  protected decide(
    premises: NamedFormula[],
    conclusion: NamedFormula,
    cache: FormalizationCache
  ): Promise<ValidityOutcome> {
    return checkValidity(this.prover, { premises, conclusion, declarations: cache.declarations });
  }
}

/** Formulas for the given items, or null if any item lacks one. */
function formulasFor(items: PcsItem[], cache: FormalizationCache): NamedFormula[] | null {
  const named: NamedFormula[] = [];
  for (const item of items) {
    const formula = cache.expressions.get(item.propositionLabel);
    if (!formula) return null;
    named.push({ name: item.label, formula });
  }
  return named;
}

function premisesOf(argument: Argument): PcsItem[] {
  return argument.pcs.filter((item) => !isConclusion(item));
}

function finalConclusion(argument: Argument): PcsItem | null {
  const last = argument.pcs[argument.pcs.length - 1];
  return last && isConclusion(last) ? last : null;
}

function missingFormalizations(argument: Argument, what: string): string {
  return `In ${argumentName(argument)}: failed to evaluate ${what} due to missing or flawed formalizations.`;
}

export class LocalValidityHandler extends LogicStageHandler {
  constructor(opts: LogicStageOptions) {
    super('logreco.local-validity', opts);
  }

  protected async inspect(graph: ArgumentGraph, cache: FormalizationCache): Promise<string[]> {
    const messages: string[] = [];

    for (const argument of graph.arguments) {
      for (const [position, item] of argument.pcs.entries()) {
        if (!isConclusion(item)) continue;
        const refs = inferenceRefs(item, this.fromKey);
        if (!refs || refs.length === 0) continue;

        const earlier = argument.pcs.slice(0, position);
        const used = [...new Set(refs)].map((ref) => earlier.find((i) => i.label === ref));
        if (used.some((i) => i === undefined)) continue;

        const premises = formulasFor(used.filter((i): i is PcsItem => i !== undefined), cache);
        const conclusion = formulasFor([item], cache);
        if (!premises || !conclusion) {
          messages.push(missingFormalizations(argument, `the inference to (${item.label})`));
          continue;
        }

        const outcome = await this.decide(premises, conclusion[0], cache);
        if (outcome.kind === 'invalid') {
          messages.push(
            `In ${argumentName(argument)}: according to the provided formalizations, the inference to conclusion (${item.label}) is not deductively valid. SMT-LIB program:\n${outcome.program}`
          );
        } else if (outcome.kind === 'fault') {
          messages.push(
            `In ${argumentName(argument)}: validity of the inference to conclusion (${item.label}) ${describeFault(outcome)}`
          );
        }
      }
    }

    return messages;
  }
}

export class GlobalValidityHandler extends LogicStageHandler {
  constructor(opts: LogicStageOptions) {
    super('logreco.global-validity', opts);
  }

  protected async inspect(graph: ArgumentGraph, cache: FormalizationCache): Promise<string[]> {
    const messages: string[] = [];

    for (const argument of graph.arguments) {
      const last = finalConclusion(argument);
      if (!last) continue;

      const premises = formulasFor(premisesOf(argument), cache);
      const conclusion = formulasFor([last], cache);
      if (!premises || !conclusion) {
        messages.push(missingFormalizations(argument, 'global validity'));
        continue;
      }

      const outcome = await this.decide(premises, conclusion[0], cache);
      if (outcome.kind === 'invalid') {
        messages.push(
          `In ${argumentName(argument)}: according to the provided formalizations, the argument is not deductively valid. SMT-LIB program:\n${outcome.program}`
        );
      } else if (outcome.kind === 'fault') {
        messages.push(`In ${argumentName(argument)}: global validity ${describeFault(outcome)}`);
      }
    }

    return messages;
  }
}

/**
 * Flags premises the final conclusion does not need. Arguments with a
 * single premise are skipped: dropping it would only test whether the
 * conclusion is a tautology.
 */
export class PremiseRelevanceHandler extends LogicStageHandler {
  constructor(opts: LogicStageOptions) {
    super('logreco.premise-relevance', opts);
  }

  protected async inspect(graph: ArgumentGraph, cache: FormalizationCache): Promise<string[]> {
    const messages: string[] = [];

    for (const argument of graph.arguments) {
      const last = finalConclusion(argument);
      const premises = premisesOf(argument);
      if (!last || premises.length < 2) continue;

      const named = formulasFor(premises, cache);
      const conclusion = formulasFor([last], cache);
      if (!named || !conclusion) {
        messages.push(missingFormalizations(argument, 'premise relevance'));
        continue;
      }

      for (const [index, premise] of named.entries()) {
        const rest = named.filter((_, i) => i !== index);
        const outcome = await this.decide(rest, conclusion[0], cache);
        if (outcome.kind === 'valid') {
          messages.push(
            `In ${argumentName(argument)}: premise (${premise.name}) is not required to logically infer the final conclusion.`
          );
        } else if (outcome.kind === 'fault') {
          messages.push(
            `In ${argumentName(argument)}: relevance of premise (${premise.name}) ${describeFault(outcome)}`
          );
        }
      }
    }

    return messages;
  }
}

/** The premises are inconsistent iff they entail the negation of the first one. */
export class PremiseConsistencyHandler extends LogicStageHandler {
  constructor(opts: LogicStageOptions) {
    super('logreco.premise-consistency', opts);
  }

  protected async inspect(graph: ArgumentGraph, cache: FormalizationCache): Promise<string[]> {
    const messages: string[] = [];

    for (const argument of graph.arguments) {
      const premises = premisesOf(argument);
      if (premises.length === 0) continue;

      const named = formulasFor(premises, cache);
      if (!named) {
        messages.push(missingFormalizations(argument, 'premise consistency'));
        continue;
      }

      const first = named[0];
      const outcome = await this.decide(
        named,
        { name: `not_${first.name}`, formula: negate(first.formula) },
        cache
      );
      if (outcome.kind === 'valid') {
        messages.push(
          `In ${argumentName(argument)}: according to the provided formalizations, the premises are not jointly satisfiable. SMT-LIB program:\n${outcome.program}`
        );
      } else if (outcome.kind === 'fault') {
        messages.push(`In ${argumentName(argument)}: premise consistency ${describeFault(outcome)}`);
      }
    }

    return messages;
  }
}

/**
 * Axiomatic relations between formalized propositions must
 * hold logically: support as entailment, attack as entailment of the
 * negation, contradiction as mutual entailment of negations.
 */
export class RelationGroundednessHandler extends LogicStageHandler {
  constructor(opts: LogicStageOptions) {
    super('logreco.relation-groundedness', opts);
  }

  protected async inspect(graph: ArgumentGraph, cache: FormalizationCache): Promise<string[]> {
    const messages: string[] = [];

    for (const relation of graph.relations) {
      if (!relation.dialectics.includes('axiomatic')) continue;
      const source = cache.expressions.get(relation.source);
      const target = cache.expressions.get(relation.target);
      if (!source || !target) continue;

      const from = `[${relation.source}]`;
      const to = `[${relation.target}]`;
      const checks: Array<{ premise: NamedFormula; conclusion: NamedFormula; claim: string }> = [];
      if (relation.valence === 'support') {
        checks.push({
          premise: { name: relation.source, formula: source },
          conclusion: { name: relation.target, formula: target },
          claim: `${from} does not entail ${to}`,
        });
      } else {
        checks.push({
          premise: { name: relation.source, formula: source },
          conclusion: { name: `not_${relation.target}`, formula: negate(target) },
          claim: `${from} does not entail the negation of ${to}`,
        });
      }
      if (relation.valence === 'contradict') {
        checks.push({
          premise: { name: relation.target, formula: target },
          conclusion: { name: `not_${relation.source}`, formula: negate(source) },
          claim: `${to} does not entail the negation of ${from}`,
        });
      }

      for (const check of checks) {
        const outcome = await this.decide([check.premise], check.conclusion, cache);
        if (outcome.kind === 'invalid') {
          messages.push(
            `Declared ${relation.valence} relation from ${from} to ${to} is not grounded in the formalizations: ${check.claim}.`
          );
        } else if (outcome.kind === 'fault') {
          messages.push(
            `Groundedness of the ${relation.valence} relation from ${from} to ${to} ${describeFault(outcome)}`
          );
        }
      }
    }

    return messages;
  }
}
