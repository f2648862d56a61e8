/**
 * Error types for manifest packaging
 * Every fatal condition carries a stable code and the context needed to fix it
 */

import type { ArkErrors } from 'arktype';

export class SimkubeManifestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SimkubeManifestError';
  }
}

/**
 * A required release input (such as the application version) is absent
 */
export class MissingRequiredConfigurationError extends SimkubeManifestError {
  constructor(
    public readonly variable: string,
    public readonly reason: string
  ) {
    super(
      `Missing required configuration '${variable}': ${reason}`,
      'MISSING_REQUIRED_CONFIGURATION',
      { variable }
    );
    this.name = 'MissingRequiredConfigurationError';
  }
}

export class InvalidConfigurationError extends SimkubeManifestError {
  constructor(
    message: string,
    public readonly setting: string,
    public readonly value: unknown
  ) {
    super(message, 'INVALID_CONFIGURATION', { setting, value });
    this.name = 'InvalidConfigurationError';
  }
}

export class DuplicateIdentifierError extends SimkubeManifestError {
  constructor(public readonly applicationId: string) {
    super(
      `Application '${applicationId}' is declared more than once in the registry`,
      'DUPLICATE_IDENTIFIER',
      { applicationId }
    );
    this.name = 'DuplicateIdentifierError';
  }
}

export class UnknownDependencyError extends SimkubeManifestError {
  constructor(
    message: string,
    public readonly applicationId: string,
    public readonly dependencyId: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'UNKNOWN_DEPENDENCY', {
      applicationId,
      dependencyId,
      suggestions,
    });
    this.name = 'UnknownDependencyError';
  }
}

export class CircularDependencyError extends SimkubeManifestError {
  constructor(
    message: string,
    public readonly cycle: string[],
    public readonly suggestions?: string[]
  ) {
    super(message, 'CIRCULAR_DEPENDENCY', {
      cycle,
      suggestions,
    });
    this.name = 'CircularDependencyError';
  }
}

export class ApplicationValidationError extends SimkubeManifestError {
  constructor(
    message: string,
    public readonly applicationId: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'APPLICATION_VALIDATION_ERROR', {
      applicationId,
      field,
      suggestions,
    });
    this.name = 'ApplicationValidationError';
  }
}

/**
 * Reading a build-produced image file failed for a reason other than absence
 */
export class ImageResolutionError extends SimkubeManifestError {
  constructor(
    public readonly applicationId: string,
    public readonly path: string,
    cause: unknown
  ) {
    super(
      `Could not read image reference for '${applicationId}' from ${path}: ${describeCause(cause)}`,
      'IMAGE_RESOLUTION_ERROR',
      { applicationId, path },
      { cause }
    );
    this.name = 'ImageResolutionError';
  }
}

/**
 * Format arktype validation errors for an application spec
 */
export function formatArktypeError(errors: ArkErrors, applicationId: string): ApplicationValidationError {
  const [first, ...rest] = errors;
  if (!first) {
    return new ApplicationValidationError(
      `Invalid application '${applicationId}': ${errors.summary}`,
      applicationId,
      undefined,
      ['Check the application spec against the ApplicationSpec schema']
    );
  }

  const fieldPath = first.path.map(String).join('.') || 'root';
  let message = `Invalid application '${applicationId}' at field '${fieldPath}': ${first.message}`;

  const suggestions: string[] = [];
  if (first.code === 'required') {
    suggestions.push(`Add the required field '${fieldPath}' to the '${applicationId}' spec`);
  } else {
    suggestions.push(`Change '${fieldPath}' in the '${applicationId}' spec so that it validates`);
  }

  if (rest.length > 0) {
    message += `\n\nAdditional validation errors:`;
    rest.forEach((problem, index) => {
      message += `\n  ${index + 2}. ${problem.path.map(String).join('.') || 'root'}: ${problem.message}`;
    });
    suggestions.push(`Fix all ${errors.length} validation errors listed above`);
  }

  return new ApplicationValidationError(message, applicationId, fieldPath, suggestions);
}

/**
 * Format an unknown dependency with the closest known ids as suggestions
 */
export function formatUnknownDependencyError(
  applicationId: string,
  dependencyId: string,
  knownIds: string[]
): UnknownDependencyError {
  const message = `Application '${applicationId}' depends on '${dependencyId}', which is not in the registry`;

  const suggestions: string[] = [];
  const similar = knownIds.filter(
    (id) =>
      id.includes(dependencyId) ||
      dependencyId.includes(id) ||
      levenshteinDistance(id, dependencyId) <= 2
  );
  if (similar.length > 0) {
    suggestions.push(`Did you mean one of these applications? ${similar.join(', ')}`);
  }
  suggestions.push(`Registered applications: ${knownIds.join(', ')}`);

  return new UnknownDependencyError(message, applicationId, dependencyId, suggestions);
}

export function formatCircularDependencyError(cycle: string[]): CircularDependencyError {
  const message = `Circular dependency detected between applications: ${cycle.join(' -> ')}`;

  const suggestions = [
    'Remove one of the dependsOn entries to break the cycle',
    'Pass shared values (such as service addresses) as literals instead of ordering constraints',
  ];

  return new CircularDependencyError(message, cycle, suggestions);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function levenshteinDistance(str1: string, str2: string): number {
  const previous: number[] = Array.from({ length: str1.length + 1 }, (_, i) => i);

  for (let j = 1; j <= str2.length; j++) {
    let diagonal = previous[0] ?? 0;
    previous[0] = j;
    for (let i = 1; i <= str1.length; i++) {
      const above = previous[i] ?? 0;
      const left = previous[i - 1] ?? 0;
      const cost = str1[i - 1] === str2[j - 1] ? 0 : 1;
      previous[i] = Math.min(above + 1, left + 1, diagonal + cost);
      diagonal = above;
    }
  }

  return previous[str1.length] ?? 0;
}
