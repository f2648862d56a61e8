import { type } from 'arktype';
import { describe, expect, it } from 'vitest';
import {
  ApplicationValidationError,
  DuplicateIdentifierError,
  formatArktypeError,
  formatUnknownDependencyError,
  ImageResolutionError,
  isNodeError,
  MissingRequiredConfigurationError,
  SimkubeManifestError,
} from '../../src/core/errors.js';

describe('Manifest errors', () => {
  it('should carry a stable code and context', () => {
    const error = new MissingRequiredConfigurationError('APP_VERSION', 'needed for release images');

    expect(error).toBeInstanceOf(SimkubeManifestError);
    expect(error.name).toBe('MissingRequiredConfigurationError');
    expect(error.code).toBe('MISSING_REQUIRED_CONFIGURATION');
    expect(error.variable).toBe('APP_VERSION');
    expect(error.message).toBe("Missing required configuration 'APP_VERSION': needed for release images");
  });

  it('should name the duplicated application', () => {
    const error = new DuplicateIdentifierError('sk-ctrl');

    expect(error.code).toBe('DUPLICATE_IDENTIFIER');
    expect(error.context).toEqual({ applicationId: 'sk-ctrl' });
  });

  it('should keep the underlying I/O error as cause', () => {
    const cause = new Error('EACCES: permission denied');
    const error = new ImageResolutionError('sk-ctrl', '.build/sk-ctrl-image', cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      "Could not read image reference for 'sk-ctrl' from .build/sk-ctrl-image: EACCES: permission denied"
    );
  });

  it('should suggest close matches for unknown dependencies', () => {
    const error = formatUnknownDependencyError('test', 'sk-vnod', ['sk-ctrl', 'sk-vnode']);

    expect(error.message).toBe("Application 'test' depends on 'sk-vnod', which is not in the registry");
    expect(error.suggestions).toEqual([
      'Did you mean one of these applications? sk-vnode',
      'Registered applications: sk-ctrl, sk-vnode',
    ]);
  });

  it('should point at the first invalid field of a schema failure', () => {
    const schema = type({ id: 'string', ports: 'number[]' });
    const result = schema({ id: 'sk-ctrl', ports: ['http'] });
    if (!(result instanceof type.errors)) {
      throw new Error('expected validation to fail');
    }

    const error = formatArktypeError(result, 'sk-ctrl');

    expect(error).toBeInstanceOf(ApplicationValidationError);
    expect(error.field).toBe('ports.0');
    expect(error.message.startsWith("Invalid application 'sk-ctrl' at field 'ports.0': ")).toBe(true);
  });

  it('should recognise Node system errors', () => {
    const error: NodeJS.ErrnoException = new Error('missing');
    error.code = 'ENOENT';

    expect(isNodeError(error)).toBe(true);
    expect(isNodeError(new Error('plain'))).toBe(false);
    expect(isNodeError('ENOENT')).toBe(false);
  });
});
