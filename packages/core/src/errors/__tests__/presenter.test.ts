import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { AnnotationError, ConfigError, ResolutionError } from '../../types/errors.js';
import { ErrorCode } from '../codes.js';
import { ErrorPresenter } from '../presenter.js';

describe('ErrorPresenter', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '');
    vi.stubEnv('FORCE_COLOR', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds a CLI view with location and hint', () => {
    const error = new AnnotationError({
      message: 'values.yaml: parse schema: /a: parse @schema comments: unknown annotation "minimun"',
      errorCode: ErrorCode.UNKNOWN_ANNOTATION,
      context: { key: 'minimun', pointer: '/a', file: 'values.yaml' },
    });
    const view = new ErrorPresenter('dev', { colors: false, terminalWidth: 100 }).formatForCLI(error);
    expect(view).toEqual({
      title:
        'Error E002: values.yaml: parse schema: /a: parse @schema comments: unknown annotation "minimun"',
      code: ErrorCode.UNKNOWN_ANNOTATION,
      location: 'Location: /a',
      cause: undefined,
      workaround: 'Did you mean "minimum"?',
      colors: false,
      terminalWidth: 100,
    });
  });

  it('prefers explicit suggestions', () => {
    const error = new ResolutionError({
      message: 'open ../a.json: path escapes from parent',
      errorCode: ErrorCode.REF_OUTSIDE_ROOT,
      context: { ref: 'file:///a.json' },
    });
    const presenter = new ErrorPresenter('dev', { colors: false });
    expect(presenter.formatForCLI(error).workaround).toBe(
      'Point --bundleRoot at a directory containing every referenced file'
    );
    error.suggestions = ['Move a.json under the chart'];
    expect(presenter.formatForCLI(error).workaround).toBe('Move a.json under the chart');
    expect(presenter.formatForCLI(error).location).toBe('Location: file:///a.json');
  });

  it('shows the root cause in dev only', () => {
    const root = new Error('EACCES: permission denied');
    const error = new ConfigError({
      message: 'write output out.json: cannot write',
      cause: new Error('wrapped', { cause: root }),
    });
    expect(new ErrorPresenter('dev').formatForCLI(error).cause).toBe('EACCES: permission denied');
    expect(new ErrorPresenter('prod').formatForCLI(error).cause).toBeUndefined();
  });

  it('omits a cause already in the message', () => {
    const error = new ConfigError({
      message: 'read config .schema.yaml: EACCES: permission denied',
      cause: new Error('EACCES: permission denied'),
    });
    expect(new ErrorPresenter('dev').formatForCLI(error).cause).toBeUndefined();
  });

  it('colors by environment unless told otherwise', () => {
    const error = new ConfigError({ message: 'bad' });
    expect(new ErrorPresenter('dev').formatForCLI(error).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(error).colors).toBe(false);
    vi.stubEnv('NO_COLOR', '1');
    expect(new ErrorPresenter('dev', { colors: true }).formatForCLI(error).colors).toBe(false);
  });
});

describe('WeaveError', () => {
  it('maps codes to exit codes and serializes', () => {
    const error = new ResolutionError({
      message: 'escaped',
      errorCode: ErrorCode.REF_OUTSIDE_ROOT,
      context: { ref: 'file:///a.json' },
    });
    expect(error.getExitCode()).toBe(31);
    expect(error.ref).toBe('file:///a.json');
    expect(error.toJSON('prod')).toEqual({
      name: 'ResolutionError',
      message: 'escaped',
      errorCode: ErrorCode.REF_OUTSIDE_ROOT,
      severity: 'error',
      context: { ref: 'file:///a.json' },
      cause: undefined,
    });
  });
});
