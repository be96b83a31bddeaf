// @schemaweave/core entry point
//
// Public API:
// - generateSchema() builds a JSON Schema from annotated values documents;
//   writeSchema() renders it to a file or stdout.
// - Config helpers load `.schema.yaml`, layer flag values and validate them.
// - Lower-level building blocks (annotation compiler, tree assembler, merge,
//   compliance, loaders, bundler) are exported for embedding and tests.

// Generation
export * from './generator/generate.js';
export * from './generator/output.js';
export * from './config/config.js';

// Annotations and tree assembly
export * from './annotations/annotation-compiler.js';
export * from './annotations/coerce.js';
export * from './annotations/docs-comment.js';
export * from './tree/node.js';
export * from './tree/assembler.js';
export * from './tree/scalar-kind.js';
export * from './tree/yaml-adapter.js';

// Schema model
export * from './schema/model.js';
export * from './schema/codec.js';
export * from './schema/merge.js';
export * from './schema/compliance.js';
export * from './schema/draft.js';
export * from './schema/referrer.js';

// Loading and bundling
export * from './resolver/loader.js';
export * from './resolver/file-loader.js';
export * from './resolver/http-loader.js';
export * from './resolver/http-cache.js';
export * from './resolver/cache-store.js';
export * from './resolver/scheme-loader.js';
export * from './resolver/memo-loader.js';
export * from './resolver/default-loader.js';
export * from './resolver/bundle.js';

// Errors
export * from './types/result.js';
export * from './types/errors.js';
export { ErrorCode, type Severity, EXIT_CODES, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView, type PresenterOptions } from './errors/presenter.js';
export { calculateDistance, didYouMean, getWorkaround } from './errors/suggestions.js';

// Utilities
export * from './util/pointer.js';
export * from './util/logger.js';
export * from './util/yaml.js';
