/**
 * Error kinds raised by the grammar engine and its collaborators
 */

export type GrammarErrorKind =
  | 'UnknownSegment'
  | 'InvalidFeatureName'
  | 'InvalidConfig'
  | 'InventoryTooLarge';

export class GrammarError extends Error {
  readonly kind: GrammarErrorKind;

  constructor(kind: GrammarErrorKind, message: string) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
  }
}

export class UnknownSegmentError extends GrammarError {
  readonly identifier: string;

  constructor(identifier: string) {
    super('UnknownSegment', `Unknown segment: "${identifier}"`);
    this.identifier = identifier;
  }
}

export class InvalidFeatureNameError extends GrammarError {
  readonly featureName: string;

  constructor(featureName: string, where: string) {
    super('InvalidFeatureName', `Invalid feature name "${featureName}" in ${where}`);
    this.featureName = featureName;
  }
}

export class InvalidConfigError extends GrammarError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('InvalidConfig', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class InventoryTooLargeError extends GrammarError {
  readonly featureCount: number;
  readonly limit: number;

  constructor(featureCount: number, limit: number) {
    super(
      'InventoryTooLarge',
      `Cannot enumerate inventory over ${featureCount} features (limit ${limit})`
    );
    this.featureCount = featureCount;
    this.limit = limit;
  }
}
