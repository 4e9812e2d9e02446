/**
 * beanmap: generated bean ↔ map converters for TypeScript record classes.
 *
 * This file re-exports all packages for convenience. Applications usually
 * need only the runtime; build scripts import the generator:
 *
 * @example
 * import { ConvertMap, AutoToMap } from '@beanmap/runtime';
 * import { generateConverters } from '@beanmap/generator';
 */

export * from '@beanmap/logging';
export * from '@beanmap/config';
export * from '@beanmap/runtime';
export * from '@beanmap/generator';
