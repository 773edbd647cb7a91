/**
 * Well-formedness checks for annotated source texts.
 * One result per check and annotation record, with id `arganno.<check>`.
 */

import {
  allElements,
  idList,
  SEGMENT_ATTRIBUTES,
  SEGMENT_TAG,
  segmentIds,
  segments,
  textOf,
} from '../artifacts/annotation.js';
import { shorten, stripWhitespace, wordCount } from '../artifacts/text.js';
import type { AnnotationElement, AnnotationTree } from '../types/models.js';
import type { AnnotationRecord, CheckOutcome, CheckResult } from '../types/verification.js';
import { fail, fromMessages, notApplicable, pass, toResult } from '../verification/outcome.js';
import type { VerificationContext } from '../verification/VerificationContext.js';
import { AnnotationHandler, type RecordHandlerOptions } from './RecordHandler.js';

/** Sources longer than this may be shortened by the annotation. */
export const SHORTENING_WORD_THRESHOLD = 200;

export interface AnnotationCheckEnv {
  source: string | null;
  legalArgumentLabels?: readonly string[];
  legalRefRecoLabels?: readonly string[];
}

export type AnnotationCheck = (tree: AnnotationTree, env: AnnotationCheckEnv) => CheckOutcome;

const quote = (segment: AnnotationElement, width = 64) => `'${shorten(textOf(segment.children), width)}'`;

function checkSourceText(tree: AnnotationTree, { source }: AnnotationCheckEnv): CheckOutcome {
  if (!source) return notApplicable();
  const original = source.trim();

  if (wordCount(original) <= SHORTENING_WORD_THRESHOLD) {
    const expected = stripWhitespace(original);
    const actual = stripWhitespace(textOf(tree.nodes));
    if (expected === actual) return pass();
    let at = 0;
    while (at < expected.length && expected[at] === actual[at]) at++;
    return fail(
      `Source text '${shorten(original, 40)}' was altered in the annotation (first difference after ${at} non-whitespace characters).`
    );
  }

  const cleaned = stripWhitespace(original);
  const messages: string[] = [];
  let cursor = 0;
  for (const segment of segments(tree)) {
    const text = stripWhitespace(textOf(segment.children));
    const found = cleaned.indexOf(text, cursor);
    if (found >= 0) {
      cursor = found + text.length;
    } else if (cleaned.includes(text)) {
      messages.push(
        `Text flow mixup: annotated segment ${quote(segment, 40)} does not appear after the previous segment in the source text.`
      );
    } else {
      messages.push(`Annotated segment ${quote(segment, 40)} is missing from the source text.`);
    }
  }
  return fromMessages(messages);
}

function checkNesting(tree: AnnotationTree): CheckOutcome {
  const nested = segments(tree)
    .filter((s) => allElements({ nodes: s.children }).some((e) => e.tag === SEGMENT_TAG))
    .map((s) => quote(s, 256));
  return nested.length > 0 ? fail(`Nested annotations in segment(s) ${nested.join(', ')}.`) : pass();
}

function checkIdPresence(tree: AnnotationTree): CheckOutcome {
  const missing = segments(tree)
    .filter((s) => !s.attributes.id)
    .map((s) => quote(s));
  return missing.length > 0 ? fail(`Missing id in segment(s) ${missing.join(', ')}.`) : pass();
}

function checkIdUniqueness(tree: AnnotationTree): CheckOutcome {
  const ids = segments(tree)
    .map((s) => s.attributes.id)
    .filter((id): id is string => Boolean(id));
  const duplicates = [...new Set(ids.filter((id, i) => ids.indexOf(id) !== i))];
  return duplicates.length > 0 ? fail(`Duplicate ids: ${duplicates.join(', ')}.`) : pass();
}

function checkReferences(attribute: 'supports' | 'attacks', verb: string): AnnotationCheck {
  return (tree) => {
    const ids = segmentIds(tree);
    const messages: string[] = [];
    for (const segment of segments(tree)) {
      for (const ref of idList(segment, attribute)) {
        if (!ids.has(ref)) {
          messages.push(`${verb} segment with id '${ref}' in segment ${quote(segment)} does not exist.`);
        }
      }
    }
    return fromMessages(messages);
  };
}

function checkAttributes(tree: AnnotationTree): CheckOutcome {
  const messages = segments(tree).flatMap((segment) =>
    Object.keys(segment.attributes)
      .filter((name) => !SEGMENT_ATTRIBUTES.includes(name))
      .map((name) => `Unknown attribute '${name}' in segment ${quote(segment)}.`)
  );
  return fromMessages(messages);
}

function checkElements(tree: AnnotationTree): CheckOutcome {
  const messages = allElements(tree)
    .filter((e) => e.tag !== SEGMENT_TAG)
    .map((e) => `Unknown element '${e.tag}' at ${quote(e)}.`);
  return fromMessages(messages);
}

function checkLabels(
  attribute: 'argument_label' | 'ref_reco_label',
  legal: (env: AnnotationCheckEnv) => readonly string[] | undefined
): AnnotationCheck {
  return (tree, env) => {
    const allowed = legal(env);
    if (!allowed) return notApplicable();
    const messages = segments(tree)
      .filter((s) => s.attributes[attribute] !== undefined && !allowed.includes(s.attributes[attribute]))
      .map((s) => `Illegal ${attribute} '${s.attributes[attribute]}' in segment ${quote(s)}.`);
    return fromMessages(messages);
  };
}

export const ANNOTATION_CHECKS: Readonly<Record<string, AnnotationCheck>> = Object.freeze({
  'source-text-integrity': checkSourceText,
  'nested-segments': checkNesting,
  'segment-id-presence': checkIdPresence,
  'segment-id-uniqueness': checkIdUniqueness,
  'support-references': checkReferences('supports', 'Supported'),
  'attack-references': checkReferences('attacks', 'Attacked'),
  'attribute-validity': checkAttributes,
  'element-validity': checkElements,
  'argument-label-legality': checkLabels('argument_label', (env) => env.legalArgumentLabels),
  'ref-reco-label-legality': checkLabels('ref_reco_label', (env) => env.legalRefRecoLabels),
});

export interface AnnotationChecksOptions extends RecordHandlerOptions {
  legalArgumentLabels?: readonly string[];
  legalRefRecoLabels?: readonly string[];
}

export class AnnotationChecksHandler extends AnnotationHandler {
  private readonly legalArgumentLabels?: readonly string[];
  private readonly legalRefRecoLabels?: readonly string[];

  constructor(opts: AnnotationChecksOptions) {
    super('arganno.checks', opts);
    this.legalArgumentLabels = opts.legalArgumentLabels;
    this.legalRefRecoLabels = opts.legalRefRecoLabels;
  }

  protected evaluate(
    record: AnnotationRecord,
    tree: AnnotationTree,
    ctx: VerificationContext
  ): CheckResult[] {
    const env: AnnotationCheckEnv = {
      source: ctx.source,
      legalArgumentLabels: this.legalArgumentLabels,
      legalRefRecoLabels: this.legalRefRecoLabels,
    };
    return Object.entries(ANNOTATION_CHECKS)
      .map(([id, check]) => toResult(`arganno.${id}`, [record.id], check(tree, env)))
      .filter((result): result is CheckResult => result !== null);
  }
}
