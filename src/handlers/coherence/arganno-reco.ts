/**
 * Annotated source text against reconstruction.
 *
 * Segments point into the reconstruction through `argument_label` and
 * `ref_reco_label`; propositions point back through `annotation_ids`.
 * Both directions must agree, and annotated support and attack must match
 * the reconstruction's relations and inferences.
 */

import { annotatedRelations, segmentIds, segments } from '../../artifacts/annotation.js';
import {
  annotationIds,
  findArgument,
  findProposition,
  inferenceChain,
  relationsBetween,
} from '../../artifacts/graph.js';
import { isOpposing } from '../../logic/dialectics.js';
import type { AnnotationTree, ArgumentGraph } from '../../types/models.js';
import {
  CoherenceHandler,
  asAnnotation,
  asGraph,
  type CoherenceHandlerOptions,
} from '../CoherenceHandler.js';
import { CompositeHandler } from '../CompositeHandler.js';

export interface AnnoRecoOptions extends CoherenceHandlerOptions {
  fromKey?: string;
}

/** Where each segment lands in the reconstruction. */
interface SegmentLinks {
  argumentLabel: Map<string, string>;
  itemLabel: Map<string, string>;
  propositionLabel: Map<string, string>;
}

function linkSegments(tree: AnnotationTree, reco: ArgumentGraph): SegmentLinks {
  const links: SegmentLinks = {
    argumentLabel: new Map(),
    itemLabel: new Map(),
    propositionLabel: new Map(),
  };

  for (const segment of segments(tree)) {
    const { id, argument_label: label, ref_reco_label: ref } = segment.attributes;
    if (!id || !label) continue;
    const argument = findArgument(reco, label);
    if (!argument) continue;

    links.argumentLabel.set(id, label);
    if (ref === undefined) continue;
    links.itemLabel.set(id, ref);
    const item = argument.pcs.find((i) => i.label === ref);
    if (item) links.propositionLabel.set(id, item.propositionLabel);
  }

  return links;
}

export class AnnoRecoElementsHandler extends CoherenceHandler<AnnotationTree, ArgumentGraph> {
  constructor(name: string, opts: AnnoRecoOptions) {
    super(name, [asAnnotation, asGraph], opts);
  }

  protected compare(tree: AnnotationTree, reco: ArgumentGraph): string[] {
    const messages: string[] = [];
    const ids = segmentIds(tree);
    const links = linkSegments(tree, reco);

    for (const segment of segments(tree)) {
      const { id, argument_label: label, ref_reco_label: ref } = segment.attributes;
      const argument = label === undefined ? undefined : findArgument(reco, label);
      if (!argument) {
        messages.push(
          `Illegal 'argument_label' reference of segment with id=${id}: no argument with label '${label}' in the reconstruction.`
        );
        continue;
      }
      if (!id || ref === undefined || argument.pcs.length === 0) continue;

      const item = argument.pcs.find((i) => i.label === ref);
      if (!item) {
        messages.push(
          `Illegal 'ref_reco_label' reference of segment with id=${id}: no premise or conclusion with label '${ref}' in argument <${label}>.`
        );
        continue;
      }
      const refs = annotationIds(findProposition(reco, item.propositionLabel)?.data ?? {}) ?? [];
      if (!refs.includes(id)) {
        messages.push(
          `Label reference mismatch: segment with id=${id} refers to item (${item.label}) of argument <${label}>, but the annotation_ids [${refs.join(', ')}] of that proposition do not include ${id}.`
        );
      }
    }

    const referenced = new Set(links.argumentLabel.values());
    for (const argument of reco.arguments) {
      if (argument.label && !referenced.has(argument.label)) {
        messages.push(`Free floating argument: <${argument.label}> has no corresponding segments in the annotation.`);
      }
      for (const item of argument.pcs) {
        const refs = annotationIds(findProposition(reco, item.propositionLabel)?.data ?? {});
        if (refs === null) {
          messages.push(`Missing 'annotation_ids' in proposition (${item.label}) of argument <${argument.label}>.`);
          continue;
        }
        for (const ref of refs) {
          if (!ids.has(ref)) {
            messages.push(
              `Illegal 'annotation_ids' reference in proposition (${item.label}) of argument <${argument.label}>: no segment with id='${ref}' in the annotation.`
            );
          }
        }
      }
    }

    const { propositions } = reco;
    propositions.forEach((first, i) => {
      const firstIds = annotationIds(first.data) ?? [];
      for (const second of propositions.slice(i + 1)) {
        const shared = (annotationIds(second.data) ?? []).filter((id) => firstIds.includes(id));
        if (shared.length > 0) {
          messages.push(
            `Label reference mismatch: segment(s) ${shared.map((s) => `'${s}'`).join(', ')} are referenced by distinct propositions ([${first.label}], [${second.label}]).`
          );
        }
      }
    });

    return messages;
  }
}

export class AnnoRecoRelationsHandler extends CoherenceHandler<AnnotationTree, ArgumentGraph> {
  private readonly fromKey: string;

  constructor(name: string, opts: AnnoRecoOptions) {
    super(name, [asAnnotation, asGraph], opts);
    this.fromKey = opts.fromKey ?? 'from';
  }

  protected compare(tree: AnnotationTree, reco: ArgumentGraph): string[] {
    const messages: string[] = [];
    const links = linkSegments(tree, reco);

    for (const { from, to, valence } of annotatedRelations(tree)) {
      const fromArgument = links.argumentLabel.get(from);
      const toArgument = links.argumentLabel.get(to);
      if (fromArgument === undefined || toArgument === undefined) {
        messages.push(
          `Annotated ${valence} relation ${from} -> ${to} is not matched by any relation in the reconstruction (illegal argument_labels).`
        );
        continue;
      }

      if (valence === 'attack' && fromArgument === toArgument) {
        messages.push(
          `Segments assigned to the same argument cannot attack each other (${from} attacks ${to} while both are assigned to <${fromArgument}>).`
        );
        continue;
      }

      if (fromArgument !== toArgument) {
        const fromProposition = links.propositionLabel.get(from);
        const toProposition = links.propositionLabel.get(to);
        const candidates = [
          ...relationsBetween(reco, fromArgument, toArgument),
          ...relationsBetween(reco, fromArgument, toProposition),
          ...relationsBetween(reco, fromProposition, toArgument),
          ...relationsBetween(reco, fromProposition, toProposition),
        ];
        const matched = candidates.some((r) =>
          valence === 'support' ? r.valence === 'support' : isOpposing(r.valence)
        );
        if (!matched) {
          messages.push(
            `Segments ${from} and ${to} are annotated as ${valence}, but none of <${fromArgument}>/[${fromProposition ?? ''}] ${valence}s <${toArgument}> or [${toProposition ?? ''}] in the reconstruction.`
          );
        }
        continue;
      }

      const argument = findArgument(reco, fromArgument);
      const fromItem = links.itemLabel.get(from);
      const toItem = links.itemLabel.get(to);
      if (!argument || fromItem === undefined || toItem === undefined) continue;
      if (!inferenceChain(argument, toItem, this.fromKey).has(fromItem)) {
        messages.push(
          `Annotated support relation ${from} -> ${to} is not matched by the inferential relations in argument <${argument.label}>.`
        );
      }
    }

    return messages;
  }
}

export function createArgannoRecoHandler(prefix: 'arganno_infreco' | 'arganno_logreco', opts: AnnoRecoOptions): CompositeHandler {
  return new CompositeHandler(
    prefix,
    [
      new AnnoRecoElementsHandler(`${prefix}.elements`, opts),
      new AnnoRecoRelationsHandler(`${prefix}.relations`, opts),
    ],
    opts
  );
}
