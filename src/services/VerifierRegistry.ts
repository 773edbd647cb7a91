/**
 * Verifier registry.
 * Each named verifier declares its roles and options and assembles a
 * handler chain from validated configuration.
 */

import { ConfigurationError, VerifierNotFoundError } from '../errors.js';
import { createArgannoArgmapHandler } from '../handlers/coherence/arganno-argmap.js';
import { createArgannoRecoHandler } from '../handlers/coherence/arganno-reco.js';
import { createArgmapInfrecoHandler } from '../handlers/coherence/argmap-infreco.js';
import { createArgmapLogrecoHandler } from '../handlers/coherence/argmap-logreco.js';
import { AnnotationChecksHandler } from '../handlers/arganno.js';
import { MapChecksHandler } from '../handlers/argmap.js';
import { CompositeHandler } from '../handlers/CompositeHandler.js';
import type { Handler } from '../handlers/Handler.js';
import {
  GlobalValidityHandler,
  LocalValidityHandler,
  PremiseConsistencyHandler,
  PremiseRelevanceHandler,
  RelationGroundednessHandler,
} from '../handlers/logic-stages.js';
import { RequireArtifactHandler } from '../handlers/RequireArtifactHandler.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITheoremProver } from '../providers/ITheoremProver.js';
import { DEFAULT_RULE_SETTINGS, type RuleSettings } from '../rules/argument-rules.js';
import { DimensionHandler } from '../rules/DimensionHandler.js';
import {
  INFRECO_DIMENSIONS,
  INFRECO_MULTI_DIMENSIONS,
  LOGRECO_DIMENSIONS,
  LOGRECO_MULTI_DIMENSIONS,
  type DimensionTable,
} from '../rules/dimensions.js';
import type { VerifierCategory, VerifierInfo, VerifierOptionInfo } from '../types/api.js';
import type { ArtifactFilter, ArtifactRole, FilterCriterion } from '../types/verification.js';
import { DEFAULT_COHERENCE_CRITERIA, isArtifactRole, roleFilter } from '../verification/filters.js';

// ── Options ──

export const OPTION_CATALOG = {
  fromKey: {
    name: 'fromKey',
    type: 'string',
    default: DEFAULT_RULE_SETTINGS.fromKey,
    description: 'Inference data key listing the items a conclusion is inferred from.',
  },
  formalizationKey: {
    name: 'formalizationKey',
    type: 'string',
    default: DEFAULT_RULE_SETTINGS.formalizationKey,
    description: 'Proposition inline data key holding the formula.',
  },
  declarationsKey: {
    name: 'declarationsKey',
    type: 'string',
    default: DEFAULT_RULE_SETTINGS.declarationsKey,
    description: 'Proposition inline data key holding symbol declarations.',
  },
  N: {
    name: 'N',
    type: 'integer',
    default: DEFAULT_RULE_SETTINGS.minArguments,
    description: 'Minimum number of reconstructed arguments.',
  },
  legalArgumentLabels: {
    name: 'legalArgumentLabels',
    type: 'string-list',
    default: null,
    description: 'Allowed argument_label values in annotations. Unchecked when absent.',
  },
  legalRefRecoLabels: {
    name: 'legalRefRecoLabels',
    type: 'string-list',
    default: null,
    description: 'Allowed ref_reco_label values in annotations. Unchecked when absent.',
  },
  filters: {
    name: 'filters',
    type: 'role-filters',
    default: null,
    description: 'Role to front matter criteria ({ key, value, regex? }) selecting its artifacts.',
  },
} satisfies Record<string, VerifierOptionInfo>;

export type OptionName = keyof typeof OPTION_CATALOG;

export interface VerifierConfig {
  settings: RuleSettings;
  legalArgumentLabels?: string[];
  legalRefRecoLabels?: string[];
  filters: Record<ArtifactRole, ArtifactFilter>;
}

export interface VerifierDeps {
  prover: ITheoremProver;
  logger?: ILogProvider;
}

export interface VerifierDefinition {
  name: string;
  description: string;
  category: VerifierCategory;
  roles: ArtifactRole[];
  options: OptionName[];
  build(config: VerifierConfig, deps: VerifierDeps): Handler[];
}

// ── Chain parts ──

function requireAll(roles: ArtifactRole[], config: VerifierConfig, deps: VerifierDeps): Handler[] {
  return roles.map((role) => new RequireArtifactHandler(role, { filter: config.filters[role], logger: deps.logger }));
}

function annotationChecks(config: VerifierConfig, deps: VerifierDeps): Handler {
  return new AnnotationChecksHandler({
    filter: config.filters.arganno,
    legalArgumentLabels: config.legalArgumentLabels,
    legalRefRecoLabels: config.legalRefRecoLabels,
    logger: deps.logger,
  });
}

function mapChecks(config: VerifierConfig, deps: VerifierDeps): Handler {
  return new MapChecksHandler({ filter: config.filters.argmap, logger: deps.logger });
}

function dimensions(
  role: 'infreco' | 'logreco',
  table: DimensionTable,
  config: VerifierConfig,
  deps: VerifierDeps
): Handler {
  return new DimensionHandler(role, {
    table,
    settings: config.settings,
    filter: config.filters[role],
    logger: deps.logger,
  });
}

function logicStages(config: VerifierConfig, deps: VerifierDeps): Handler {
  const opts = {
    filter: config.filters.logreco,
    prover: deps.prover,
    fromKey: config.settings.fromKey,
    logger: deps.logger,
  };
  return new CompositeHandler(
    'logreco.logic',
    [
      new LocalValidityHandler(opts),
      new GlobalValidityHandler(opts),
      new PremiseRelevanceHandler(opts),
      new PremiseConsistencyHandler(opts),
      new RelationGroundednessHandler(opts),
    ],
    { logger: deps.logger }
  );
}

const pair = (config: VerifierConfig, a: ArtifactRole, b: ArtifactRole): [ArtifactFilter, ArtifactFilter] => [
  config.filters[a],
  config.filters[b],
];

// ── Definitions ──

const RECO_OPTIONS: OptionName[] = ['fromKey', 'filters'];
const LOGIC_OPTIONS: OptionName[] = ['fromKey', 'formalizationKey', 'declarationsKey', 'filters'];
const LABEL_OPTIONS: OptionName[] = ['legalArgumentLabels', 'legalRefRecoLabels'];

export const VERIFIER_DEFINITIONS: readonly VerifierDefinition[] = [
  {
    name: 'arganno',
    description: 'Well-formedness of an annotated source text.',
    category: 'core',
    roles: ['arganno'],
    options: [...LABEL_OPTIONS, 'filters'],
    build: (config, deps) => [...requireAll(['arganno'], config, deps), annotationChecks(config, deps)],
  },
  {
    name: 'argmap',
    description: 'Well-formedness of an argument map.',
    category: 'core',
    roles: ['argmap'],
    options: ['filters'],
    build: (config, deps) => [...requireAll(['argmap'], config, deps), mapChecks(config, deps)],
  },
  {
    name: 'infreco',
    description: 'Structure of an informal argument reconstruction.',
    category: 'core',
    roles: ['infreco'],
    options: RECO_OPTIONS,
    build: (config, deps) => [
      ...requireAll(['infreco'], config, deps),
      dimensions('infreco', INFRECO_DIMENSIONS, config, deps),
    ],
  },
  {
    name: 'logreco',
    description: 'Structure, formalizations and deductive validity of a logical reconstruction.',
    category: 'core',
    roles: ['logreco'],
    options: LOGIC_OPTIONS,
    build: (config, deps) => [
      ...requireAll(['logreco'], config, deps),
      dimensions('logreco', LOGRECO_DIMENSIONS, config, deps),
      logicStages(config, deps),
    ],
  },
  {
    name: 'arganno_argmap',
    description: 'Annotated source text and argument map, each well-formed and mutually coherent.',
    category: 'coherence',
    roles: ['arganno', 'argmap'],
    options: [...LABEL_OPTIONS, 'filters'],
    build: (config, deps) => [
      ...requireAll(['arganno', 'argmap'], config, deps),
      annotationChecks(config, deps),
      mapChecks(config, deps),
      createArgannoArgmapHandler({ filters: pair(config, 'arganno', 'argmap'), logger: deps.logger }),
    ],
  },
  {
    name: 'arganno_infreco',
    description: 'Annotated source text and informal reconstructions, each well-formed and mutually coherent.',
    category: 'coherence',
    roles: ['arganno', 'infreco'],
    options: [...RECO_OPTIONS, 'N', ...LABEL_OPTIONS],
    build: (config, deps) => [
      ...requireAll(['arganno', 'infreco'], config, deps),
      annotationChecks(config, deps),
      dimensions('infreco', INFRECO_MULTI_DIMENSIONS, config, deps),
      createArgannoRecoHandler('arganno_infreco', {
        filters: pair(config, 'arganno', 'infreco'),
        fromKey: config.settings.fromKey,
        logger: deps.logger,
      }),
    ],
  },
  {
    name: 'arganno_logreco',
    description: 'Annotated source text and logical reconstructions, each well-formed and mutually coherent.',
    category: 'coherence',
    roles: ['arganno', 'logreco'],
    options: [...LOGIC_OPTIONS, 'N', ...LABEL_OPTIONS],
    build: (config, deps) => [
      ...requireAll(['arganno', 'logreco'], config, deps),
      annotationChecks(config, deps),
      dimensions('logreco', LOGRECO_MULTI_DIMENSIONS, config, deps),
      logicStages(config, deps),
      createArgannoRecoHandler('arganno_logreco', {
        filters: pair(config, 'arganno', 'logreco'),
        fromKey: config.settings.fromKey,
        logger: deps.logger,
      }),
    ],
  },
  {
    name: 'argmap_infreco',
    description: 'Argument map and informal reconstructions, each well-formed and mutually coherent.',
    category: 'coherence',
    roles: ['argmap', 'infreco'],
    options: [...RECO_OPTIONS, 'N'],
    build: (config, deps) => [
      ...requireAll(['argmap', 'infreco'], config, deps),
      mapChecks(config, deps),
      dimensions('infreco', INFRECO_MULTI_DIMENSIONS, config, deps),
      createArgmapInfrecoHandler({ filters: pair(config, 'argmap', 'infreco'), logger: deps.logger }),
    ],
  },
  {
    name: 'argmap_logreco',
    description: 'Argument map and logical reconstructions, each well-formed and mutually coherent.',
    category: 'coherence',
    roles: ['argmap', 'logreco'],
    options: [...LOGIC_OPTIONS, 'N'],
    build: (config, deps) => {
      const filters = pair(config, 'argmap', 'logreco');
      return [
        ...requireAll(['argmap', 'logreco'], config, deps),
        mapChecks(config, deps),
        dimensions('logreco', LOGRECO_MULTI_DIMENSIONS, config, deps),
        logicStages(config, deps),
        createArgmapInfrecoHandler({ filters, logger: deps.logger }),
        createArgmapLogrecoHandler({ filters, logger: deps.logger }),
      ];
    },
  },
  {
    name: 'arganno_argmap_logreco',
    description: 'Annotated source text, argument map and logical reconstructions, all mutually coherent.',
    category: 'coherence',
    roles: ['arganno', 'argmap', 'logreco'],
    options: [...LOGIC_OPTIONS, 'N', ...LABEL_OPTIONS],
    build: (config, deps) => [
      ...requireAll(['arganno', 'argmap', 'logreco'], config, deps),
      annotationChecks(config, deps),
      mapChecks(config, deps),
      dimensions('logreco', LOGRECO_MULTI_DIMENSIONS, config, deps),
      logicStages(config, deps),
      new CompositeHandler(
        'arganno_argmap_logreco',
        [
          createArgannoArgmapHandler({ filters: pair(config, 'arganno', 'argmap'), logger: deps.logger }),
          createArgannoRecoHandler('arganno_logreco', {
            filters: pair(config, 'arganno', 'logreco'),
            fromKey: config.settings.fromKey,
            logger: deps.logger,
          }),
          createArgmapLogrecoHandler({ filters: pair(config, 'argmap', 'logreco'), logger: deps.logger }),
        ],
        { logger: deps.logger }
      ),
    ],
  },
];

// ── Registry ──

export class VerifierRegistry {
  private readonly definitions: Map<string, VerifierDefinition>;

  constructor(
    private readonly deps: VerifierDeps,
    definitions: readonly VerifierDefinition[] = VERIFIER_DEFINITIONS
  ) {
    this.definitions = new Map(definitions.map((d) => [d.name, d]));
  }

  get names(): string[] {
    return [...this.definitions.keys()];
  }

  list(): VerifierInfo[] {
    return [...this.definitions.values()].map(describe);
  }

  describe(name: string): VerifierInfo {
    return describe(this.get(name));
  }

  /**
   * Assemble the chain for one run. Throws ConfigurationError on unknown
   * options, malformed values or filters for roles the verifier lacks.
   */
  build(name: string, rawConfig: Record<string, unknown> = {}): Handler {
    const definition = this.get(name);
    const config = parseConfig(definition, rawConfig);
    const [first, ...rest] = definition.build(config, this.deps);
    if (!first) throw new ConfigurationError(`Verifier "${name}" has no checks`);
    rest.reduce<Handler>((previous, handler) => previous.setNext(handler), first);
    return first;
  }

  private get(name: string): VerifierDefinition {
    const definition = this.definitions.get(name);
    if (!definition) throw new VerifierNotFoundError(name, this.names);
    return definition;
  }
}

function describe(definition: VerifierDefinition): VerifierInfo {
  return {
    name: definition.name,
    description: definition.description,
    category: definition.category,
    roles: [...definition.roles],
    options: definition.options.map((option) => ({ ...OPTION_CATALOG[option] })),
  };
}

function isOptionName(value: string): value is OptionName {
  return Object.prototype.hasOwnProperty.call(OPTION_CATALOG, value);
}

export function parseConfig(definition: VerifierDefinition, raw: Record<string, unknown>): VerifierConfig {
  const allowed = new Set<string>(definition.options);
  for (const key of Object.keys(raw)) {
    if (!isOptionName(key) || !allowed.has(key)) {
      throw new ConfigurationError(`Unknown option "${key}" for verifier "${definition.name}"`, {
        allowed: definition.options,
      });
    }
  }

  const text = (name: 'fromKey' | 'formalizationKey' | 'declarationsKey'): string => {
    const value = raw[name];
    if (value === undefined) return DEFAULT_RULE_SETTINGS[name];
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ConfigurationError(`Option "${name}" must be a non-empty string`);
    }
    return value;
  };

  const list = (name: 'legalArgumentLabels' | 'legalRefRecoLabels'): string[] | undefined => {
    const value = raw[name];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
      throw new ConfigurationError(`Option "${name}" must be a list of strings`);
    }
    return value;
  };

  const minArguments = raw.N ?? DEFAULT_RULE_SETTINGS.minArguments;
  if (typeof minArguments !== 'number' || !Number.isInteger(minArguments) || minArguments < 1) {
    throw new ConfigurationError('Option "N" must be a positive integer');
  }

  return {
    settings: {
      fromKey: text('fromKey'),
      formalizationKey: text('formalizationKey'),
      declarationsKey: text('declarationsKey'),
      minArguments,
    },
    legalArgumentLabels: list('legalArgumentLabels'),
    legalRefRecoLabels: list('legalRefRecoLabels'),
    filters: buildFilters(definition, raw.filters),
  };
}

function buildFilters(definition: VerifierDefinition, raw: unknown): Record<ArtifactRole, ArtifactFilter> {
  const criteria = parseFilters(definition, raw);
  const defaults = (role: ArtifactRole) =>
    definition.category === 'coherence' ? DEFAULT_COHERENCE_CRITERIA[role] : [];
  const filterFor = (role: ArtifactRole) => roleFilter(role, criteria.get(role) ?? defaults(role));

  return {
    arganno: filterFor('arganno'),
    argmap: filterFor('argmap'),
    infreco: filterFor('infreco'),
    logreco: filterFor('logreco'),
  };
}

function parseFilters(definition: VerifierDefinition, raw: unknown): Map<ArtifactRole, FilterCriterion[]> {
  const byRole = new Map<ArtifactRole, FilterCriterion[]>();
  if (raw === undefined) return byRole;
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError('Option "filters" must map roles to criteria lists');
  }

  for (const [role, entries] of Object.entries(raw)) {
    if (!isArtifactRole(role) || !definition.roles.includes(role)) {
      throw new ConfigurationError(`Filter role "${role}" is not used by verifier "${definition.name}"`, {
        roles: definition.roles,
      });
    }
    if (!Array.isArray(entries)) {
      throw new ConfigurationError(`Filters for role "${role}" must be a list`);
    }
    byRole.set(role, entries.map((entry: unknown, i) => parseCriterion(entry, `filters.${role}[${i}]`)));
  }
  return byRole;
}

function parseCriterion(entry: unknown, path: string): FilterCriterion {
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
    throw new ConfigurationError(`${path} must be an object`);
  }
  const fields = new Map<string, unknown>(Object.entries(entry));
  const key = fields.get('key');
  const value = fields.get('value');
  const regex = fields.get('regex');
  if (typeof key !== 'string' || typeof value !== 'string') {
    throw new ConfigurationError(`${path} needs string "key" and "value" entries`);
  }
  if (regex !== undefined && typeof regex !== 'boolean') {
    throw new ConfigurationError(`${path}.regex must be a boolean`);
  }
  return regex === undefined ? { key, value } : { key, value, regex };
}
