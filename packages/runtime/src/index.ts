export { CONVERTER_SUFFIX, REDIRECT_INFIX, CONVERTER_NAMESPACE, MANIFEST_FILE_NAME, getConvertName } from './constants';
export { isMappingConvert, isConverterClass, convertsTo } from './contract';
export type { MappingConvert, RecordType } from './contract';
export { ConfigurationError, NotFoundError, ConversionError, InvalidArgumentError, formatValue } from './errors';
export { ManifestSchema, parseManifest, serializeManifest, parseQualifiedName, formatQualifiedName } from './manifest';
export type { Manifest, ManifestParseResult, QualifiedName } from './manifest';
export { AutoToMap, IgnoreToMap, IgnoreToBean, AutoKeyMapping, MappingMethod } from './markers';
export type { AutoToMapOptions, AutoKeyMappingOptions } from './markers';
export { ConverterRegistry } from './registry';
export { buildRegistry } from './registry-loader';
export type { RegistryOptions, RegistryStrategy, ModuleImporter } from './registry-loader';
export { ConvertMap } from './convert-map';
export { readRegistryConfig, type RegistryConfig } from './config';
