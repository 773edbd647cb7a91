/**
 * Structural rules for argument graphs.
 *
 * Each rule is a pure predicate over one argument or over the whole
 * snippet. Rules are looked up by id from `RULES`; dimension tables refer
 * to them by id only.
 */

import { argumentName, inferenceRefs, isConclusion } from '../artifacts/graph.js';
import { extractFormalizations, FORMALIZATION_CACHE_KEY } from '../logic/formalizations.js';
import type { Argument, ArgumentGraph } from '../types/models.js';
import type { CheckOutcome } from '../types/verification.js';
import { fail, fromMessages, notApplicable, pass } from '../verification/outcome.js';

export interface RuleSettings {
  /** Inference data key listing the items a conclusion is inferred from. */
  fromKey: string;
  formalizationKey: string;
  declarationsKey: string;
  /** Minimum argument count for `has-at-least-n-arguments`. */
  minArguments: number;
}

export const DEFAULT_RULE_SETTINGS: Readonly<RuleSettings> = Object.freeze({
  fromKey: 'from',
  formalizationKey: 'formalization',
  declarationsKey: 'declarations',
  minArguments: 2,
});

export interface ArgumentRule {
  scope: 'argument';
  check(argument: Argument, settings: RuleSettings, index: number): CheckOutcome;
}

export interface SnippetRule {
  scope: 'snippet';
  check(graph: ArgumentGraph, settings: RuleSettings): CheckOutcome;
}

export type Rule = ArgumentRule | SnippetRule;

const rules = {
  'has-arguments': {
    scope: 'snippet',
    check: (graph) =>
      graph.arguments.length > 0 ? pass() : fail('No arguments found in the snippet.'),
  },

  'has-unique-argument': {
    scope: 'snippet',
    check: (graph) => {
      if (graph.arguments.length > 1) return fail('More than one argument found in the snippet.');
      if (graph.arguments.length === 0) return fail('No arguments found in the snippet.');
      return pass();
    },
  },

  'has-at-least-n-arguments': {
    scope: 'snippet',
    check: (graph, { minArguments }) => {
      const size = graph.arguments.length;
      return size < minArguments
        ? fail(`Not enough arguments (found ${size}, expected at least ${minArguments}).`)
        : pass();
    },
  },

  'has-pcs': {
    scope: 'argument',
    check: (argument) =>
      argument.pcs.length > 0
        ? pass()
        : fail(`${argumentName(argument)} lacks a premise-conclusion structure.`),
  },

  'starts-with-premise': {
    scope: 'argument',
    check: (argument) => {
      const first = argument.pcs[0];
      if (!first) return notApplicable();
      return isConclusion(first)
        ? fail(`${argumentName(argument)} does not start with a premise.`)
        : pass();
    },
  },

  'ends-with-conclusion': {
    scope: 'argument',
    check: (argument) => {
      const last = argument.pcs[argument.pcs.length - 1];
      if (!last) return notApplicable();
      return isConclusion(last)
        ? pass()
        : fail(`${argumentName(argument)} does not end with a conclusion.`);
    },
  },

  'no-duplicate-pcs-labels': {
    scope: 'argument',
    check: (argument) => {
      if (argument.pcs.length === 0) return notApplicable();
      const labels = argument.pcs.map((item) => item.label);
      const duplicates = [...new Set(labels.filter((l, i) => labels.indexOf(l) !== i))];
      return duplicates.length > 0
        ? fail(
            `${argumentName(argument)} has duplicate item labels: ${duplicates.map((l) => `(${l})`).join(', ')}.`
          )
        : pass();
    },
  },

  'has-label': {
    scope: 'argument',
    check: (argument, _settings, index) =>
      argument.label ? pass() : fail(`Argument #${index + 1} lacks a label.`),
  },

  'has-gist': {
    scope: 'argument',
    check: (argument) =>
      argument.gists.length > 0 ? pass() : fail(`${argumentName(argument)} lacks a gist.`),
  },

  'not-multiple-gists': {
    scope: 'argument',
    check: (argument) =>
      argument.gists.length > 1
        ? fail(`${argumentName(argument)} has alternative gists (and is declared more than once).`)
        : pass(),
  },

  'has-inference-data': {
    scope: 'argument',
    check: (argument, { fromKey }) => {
      if (argument.pcs.length === 0) return notApplicable();
      const name = argumentName(argument);
      const messages: string[] = [];

      for (const item of argument.pcs) {
        if (!isConclusion(item)) continue;
        const intro = `In ${name}: the inference to conclusion (${item.label})`;
        const refs = item.inferenceData[fromKey];
        if (Object.keys(item.inferenceData).length === 0) {
          messages.push(`${intro} lacks inference data.`);
        } else if (refs === undefined || refs === null) {
          messages.push(`${intro} lacks a '${fromKey}' entry.`);
        } else if (!Array.isArray(refs)) {
          messages.push(`${intro} has a '${fromKey}' entry that is not a list.`);
        } else if (refs.length === 0) {
          messages.push(`${intro} has an empty '${fromKey}' list.`);
        }
      }
      return fromMessages(messages);
    },
  },

  'prop-refs-exist': {
    scope: 'argument',
    check: (argument, { fromKey }) => {
      if (argument.pcs.length === 0) return notApplicable();
      const name = argumentName(argument);
      const messages: string[] = [];

      argument.pcs.forEach((item, position) => {
        if (!isConclusion(item)) return;
        const earlier = argument.pcs.slice(0, position).map((i) => i.label);
        for (const ref of inferenceRefs(item, fromKey) ?? []) {
          if (!earlier.includes(ref)) {
            messages.push(
              `In ${name}: item '${ref}' cited for conclusion (${item.label}) is not a previously introduced premise or conclusion.`
            );
          }
        }
      });
      return fromMessages(messages);
    },
  },

  'uses-all-props': {
    scope: 'argument',
    check: (argument, { fromKey }) => {
      if (argument.pcs.length === 0) return notApplicable();
      const used = new Set(
        argument.pcs.flatMap((item) => (isConclusion(item) ? inferenceRefs(item, fromKey) ?? [] : []))
      );
      const unused = argument.pcs
        .slice(0, -1)
        .filter((item) => !used.has(item.label))
        .map((item) => `(${item.label})`);
      return unused.length > 0
        ? fail(
            `In ${argumentName(argument)}: some propositions are not used in any inference: ${unused.join(', ')}.`
          )
        : pass();
    },
  },

  'no-extra-propositions': {
    scope: 'snippet',
    check: (graph) => {
      const used = new Set(graph.arguments.flatMap((a) => a.pcs.map((i) => i.propositionLabel)));
      const extra = graph.propositions.filter((p) => !used.has(p.label)).map((p) => `[${p.label}]`);
      return extra.length > 0
        ? fail(`The snippet contains propositions not used in any argument: ${extra.join(', ')}.`)
        : pass();
    },
  },

  'only-grounded-relations': {
    scope: 'snippet',
    check: (graph) =>
      graph.relations.some((r) => r.dialectics.some((d) => d !== 'grounded') || r.dialectics.length === 0)
        ? fail('The snippet declares dialectical relations of its own.')
        : pass(),
  },

  'no-prop-inline-data': {
    scope: 'snippet',
    check: (graph) =>
      graph.propositions.some((p) => Object.keys(p.data).length > 0)
        ? fail('Some propositions carry inline data.')
        : pass(),
  },

  'no-arg-inline-data': {
    scope: 'snippet',
    check: (graph) =>
      graph.arguments.some((a) => Object.keys(a.data).length > 0)
        ? fail('Some arguments carry inline data.')
        : pass(),
  },

  'well-formed-formalizations': {
    scope: 'snippet',
    check: (graph, settings) => {
      const { cache, problems } = extractFormalizations(graph, settings);
      const details = { [FORMALIZATION_CACHE_KEY]: cache };
      return problems.length > 0 ? fail(problems.join(' '), details) : pass(details);
    },
  },
} satisfies Record<string, Rule>;

export const RULES: {
  [K in keyof typeof rules]: Extract<Rule, { scope: (typeof rules)[K]['scope'] }>;
} = rules;

export type RuleId = keyof typeof RULES;
