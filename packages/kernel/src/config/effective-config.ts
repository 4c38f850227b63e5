import type { BuildConfig } from '@cfdi-bundle/contracts';
import { ConfigurationError, computeConfigHash } from '@cfdi-bundle/shared';

/**
 * Default system configuration for a submission build.
 */
export const DEFAULT_BUILD_CONFIG: BuildConfig = {
  sequenceLabelWidth: 2,
  expenseCategories: ['Miscellaneous', 'Gasoline'],
  defaultExpenseCategory: 'Miscellaneous',
  currencies: ['MXN', 'USD'],
  defaultCurrency: 'MXN',
  identifierLength: 36,
  validationPaddingRows: 50,
  spreadsheetFileName: 'SUBMISSION_IVA_FORM.xlsx',
  sheetName: 'SUBMISSION IVA FORM',
  title: 'SUBMISSION IVA FORM',
  manifestFileName: 'MANIFEST.txt',
  maxDocumentSize: 10 * 1024 * 1024, // 10MB
};

/**
 * Operator configuration that can override any default.
 */
export type OperatorConfig = Partial<BuildConfig>;

/**
 * Build-level overrides (limited to output naming).
 */
export type BuildOverrides = Partial<Pick<BuildConfig, 'spreadsheetFileName' | 'manifestFileName' | 'title'>>;

/**
 * Effective configuration result.
 */
export interface EffectiveConfig {
  /** Merged configuration */
  config: BuildConfig;
  /** SHA-256 hash of the config */
  configHash: string;
  /** Sources that contributed to this config */
  sources: ('default' | 'operator' | 'build')[];
}

/**
 * Excel rejects inline list sources longer than this
 */
const MAX_LIST_FORMULA_LENGTH = 255;
const MAX_SHEET_NAME_LENGTH = 31;
const MIN_VALIDATION_PADDING_ROWS = 50;

/**
 * Build effective configuration by merging:
 * 1. System defaults
 * 2. Operator configuration (if provided)
 * 3. Build overrides (if provided, limited scope)
 *
 * The merge follows precedence: build > operator > system defaults.
 *
 * @throws ConfigurationError when the merged configuration is unusable
 */
export function buildEffectiveConfig(
  operatorConfig?: OperatorConfig,
  buildOverrides?: BuildOverrides,
): EffectiveConfig {
  const sources: EffectiveConfig['sources'] = ['default'];
  let merged: BuildConfig = { ...DEFAULT_BUILD_CONFIG };

  if (operatorConfig) {
    sources.push('operator');
    merged = { ...merged, ...operatorConfig };
  }

  if (buildOverrides) {
    sources.push('build');
    merged = { ...merged, ...buildOverrides };
  }

  validateBuildConfig(merged);

  return {
    config: merged,
    configHash: computeConfigHash(merged),
    sources,
  };
}

/**
 * @throws ConfigurationError naming the first offending field
 */
export function validateBuildConfig(config: BuildConfig): void {
  const fail = (field: keyof BuildConfig, message: string): never => {
    throw new ConfigurationError(`Invalid build configuration: ${field} ${message}`, { field });
  };

  if (!Number.isInteger(config.sequenceLabelWidth) || config.sequenceLabelWidth < 1) {
    fail('sequenceLabelWidth', 'must be a positive integer');
  }
  if (!Number.isInteger(config.identifierLength) || config.identifierLength < 1) {
    fail('identifierLength', 'must be a positive integer');
  }
  if (!Number.isInteger(config.validationPaddingRows) || config.validationPaddingRows < MIN_VALIDATION_PADDING_ROWS) {
    fail('validationPaddingRows', `must be an integer of at least ${MIN_VALIDATION_PADDING_ROWS}`);
  }
  if (!Number.isInteger(config.maxDocumentSize) || config.maxDocumentSize < 1) {
    fail('maxDocumentSize', 'must be a positive integer');
  }

  const enumerations = [
    ['expenseCategories', config.expenseCategories, 'defaultExpenseCategory', config.defaultExpenseCategory],
    ['currencies', config.currencies, 'defaultCurrency', config.defaultCurrency],
  ] as const;
  for (const [field, values, defaultField, defaultValue] of enumerations) {
    if (values.length === 0) {
      fail(field, 'must not be empty');
    }
    if (values.some((value) => value.trim() === '' || /[",]/.test(value))) {
      fail(field, 'entries must be non-blank and contain no commas or quotes');
    }
    if (new Set(values).size !== values.length) {
      fail(field, 'must not contain duplicates');
    }
    if (values.join(',').length + 2 > MAX_LIST_FORMULA_LENGTH) {
      fail(field, `must fit in ${MAX_LIST_FORMULA_LENGTH} characters`);
    }
    if (!values.includes(defaultValue)) {
      fail(defaultField, `must be one of: ${values.join(', ')}`);
    }
  }

  if (
    config.sheetName.length === 0 ||
    config.sheetName.length > MAX_SHEET_NAME_LENGTH ||
    /[[\]:*?/\\]/.test(config.sheetName)
  ) {
    fail('sheetName', `must be 1-${MAX_SHEET_NAME_LENGTH} characters without []:*?/\\`);
  }

  for (const field of ['spreadsheetFileName', 'manifestFileName'] as const) {
    const name = config[field];
    if (name.trim() === '' || /[/\\]/.test(name)) {
      fail(field, 'must be a plain file name');
    }
    // Renamed scans are "<digits><extension>"
    if (/^\d+(\.[^.]*)?$/.test(name)) {
      fail(field, 'would collide with a renamed scanned document');
    }
  }
  if (config.spreadsheetFileName === config.manifestFileName) {
    fail('manifestFileName', 'must differ from spreadsheetFileName');
  }
}
