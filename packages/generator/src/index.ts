export { DeclarationScanner, MARKERS, type ScannerOptions } from './declaration-scanner';
export { classifyType } from './value-check';
export { resolveFieldPolicies } from './field-policy';
export { emitConverter, converterClassName, failureCondition } from './converter-emitter';
export type { EmitOptions, ImportExtension } from './converter-emitter';
export { ManifestBuilder } from './manifest-builder';
export { generateConverters, DEFAULT_RUNTIME_MODULE } from './generate';
export type { GenerateOptions, GenerateResult } from './generate';
export { readGeneratorConfig, type GeneratorConfig } from './config';
export { runGenerator } from './run';
export type {
	ClassRef,
	ConverterArtifact,
	DirectionPolicy,
	ExclusionReason,
	FieldCheck,
	FieldMarkers,
	FieldPolicy,
	KeyMapping,
	PrimitiveName,
	ScannedField,
	ScannedRecord,
	ValueCheck
} from './types';
