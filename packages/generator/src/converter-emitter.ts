import { posix } from 'node:path';
import { CodeBlockWriter } from 'ts-morph';
import {
	CONVERTER_NAMESPACE,
	ConfigurationError,
	REDIRECT_INFIX,
	formatQualifiedName,
	getConvertName
} from '@beanmap/runtime';
import type { ConverterArtifact, FieldCheck, FieldPolicy, ScannedRecord, ValueCheck } from './types';

export type ImportExtension = '' | '.js';

export interface EmitOptions {
	/** Absolute output directory; converters go under `auto-mappings/`. */
	outDir: string;
	/** Module the converter imports its contract and errors from. */
	runtimeModule: string;
	/** Suffix for relative imports: `''` for bundlers, `'.js'` for NodeNext. */
	importExtension: ImportExtension;
}

const SOURCE_EXTENSION = /\.[cm]?tsx?$/;

/** Names the converter body refers to that an imported class must not shadow. */
const RESERVED_NAMES = new Set(['ConversionError', 'MappingConvert', 'Record', 'Readonly', 'Object', 'Array']);

/**
 * `User_MapConverter`, or `Account_mapping_User_MapConverter` when
 * `Account` redirects its converter to `User`.
 */
export function converterClassName(record: ScannedRecord): string {
	const base =
		record.marked.fqn === record.record.fqn ? record.record.name : `${record.marked.name}${REDIRECT_INFIX}${record.record.name}`;
	return getConvertName(base) ?? base;
}

/**
 * Writes the converter module for one record.
 */
export function emitConverter(record: ScannedRecord, policies: readonly FieldPolicy[], options: EmitOptions): ConverterArtifact {
	const className = converterClassName(record);
	const moduleId = posix.join(CONVERTER_NAMESPACE, record.record.moduleDir, className);
	const filePath = posix.join(posix.resolve(options.outDir), `${moduleId}.ts`);
	const recordName = record.record.name;

	const toMapFields = policies.filter((policy) => policy.toMap.include);
	const toBeanFields = policies.filter((policy) => policy.toBean.include);
	const checked = toBeanFields.some((policy) => !policy.field.check.unchecked);

	const writer = new CodeBlockWriter({ useTabs: true, useSingleQuote: true, newLine: '\n' });

	writer.writeLine(`// @generated by @beanmap/generator from ${record.marked.fqn}. Do not edit.`);
	writer.writeLine(
		checked
			? `import { ConversionError, type MappingConvert } from ${quote(options.runtimeModule)};`
			: `import type { MappingConvert } from ${quote(options.runtimeModule)};`
	);
	for (const [specifier, names] of collectImports(record, toBeanFields, filePath, options)) {
		writer.writeLine(`import { ${names.join(', ')} } from ${quote(specifier)};`);
	}
	writer.blankLine();

	writer.write(`export class ${className} implements MappingConvert<${recordName}>`).block(() => {
		writer.writeLine(`readonly target = ${recordName};`);
		writer.writeLine(`readonly source = ${quote(record.marked.fqn)};`);
		writer.blankLine();

		writer.write(`toMap(entity: ${recordName} | null | undefined): Record<string, unknown>`).block(() => {
			writer.writeLine('const map: Record<string, unknown> = {};');
			writer.write('if (entity === null || entity === undefined)').block(() => {
				writer.writeLine('return map;');
			});
			for (const policy of toMapFields) {
				writer.writeLine(`map[${quote(policy.mapKey)}] = entity.${policy.field.name};`);
			}
			writer.writeLine('return map;');
		});
		writer.blankLine();

		writer.write(`toBean(data: Readonly<Record<string, unknown>>): ${recordName}`).block(() => {
			writer.writeLine(`const bean = new ${recordName}();`);
			writer.write('if (Object.keys(data).length === 0)').block(() => {
				writer.writeLine('return bean;');
			});
			const declared = new Map<string, number>();
			for (const policy of toBeanFields) {
				const name = policy.field.name;
				const count = (declared.get(name) ?? 0) + 1;
				declared.set(name, count);
				writeAssignment(writer, recordName, policy, count === 1 ? `${name}Value` : `${name}Value${count}`);
			}
			writer.writeLine('return bean;');
		});
	});
	writer.newLineIfLastNot();

	return {
		className,
		filePath,
		fqn: formatQualifiedName(moduleId, className),
		sourceFqn: record.marked.fqn,
		text: writer.toString()
	};
}

/**
 * A field redeclared down the chain is assigned once per declaring class, so
 * each repeat gets its own local.
 */
function writeAssignment(writer: CodeBlockWriter, recordName: string, policy: FieldPolicy, value: string): void {
	const { name, check, typeText } = policy.field;

	writer.writeLine(`const ${value} = data[${quote(name)}];`);
	writer.write(`if (${value} !== undefined)`).block(() => {
		const failure = failureCondition(value, check);
		if (failure) {
			writer.write(`if (${failure})`).block(() => {
				writer.writeLine(
					`throw new ConversionError(${quote(recordName)}, ${quote(name)}, ${quote(typeText)}, ${value});`
				);
			});
		}
		const assigned = check.unchecked || (check.exact && check.alternatives.length === 1) ? value : `${value} as ${recordName}['${name}']`;
		writer.writeLine(`bean.${name} = ${assigned};`);
	});
}

/**
 * Expression that is true when `value` does not fit the declared type, or
 * undefined when every value fits.
 */
export function failureCondition(value: string, check: FieldCheck): string | undefined {
	if (check.unchecked) {
		return undefined;
	}

	const { alternatives, nullable } = check;
	let mismatch: string;
	if (alternatives.length === 0) {
		mismatch = '';
	} else if (alternatives.length === 1 && alternatives[0]) {
		mismatch = negate(value, alternatives[0]);
	} else {
		mismatch = `!(${alternatives.map((alt) => passes(value, alt)).join(' || ')})`;
	}

	if (!nullable) {
		return mismatch || `${value} !== null`;
	}
	return mismatch ? `${value} !== null && ${mismatch}` : `${value} !== null`;
}

function passes(value: string, check: ValueCheck): string {
	switch (check.kind) {
		case 'typeof':
			return `typeof ${value} === '${check.type}'`;
		case 'array':
			return `Array.isArray(${value})`;
		case 'instanceof':
			return `${value} instanceof ${check.className}`;
		case 'object':
			return `(typeof ${value} === 'object' && ${value} !== null)`;
	}
}

function negate(value: string, check: ValueCheck): string {
	switch (check.kind) {
		case 'typeof':
			return `typeof ${value} !== '${check.type}'`;
		case 'array':
			return `!Array.isArray(${value})`;
		case 'instanceof':
			return `!(${value} instanceof ${check.className})`;
		case 'object':
			return `(typeof ${value} !== 'object' || ${value} === null)`;
	}
}

/**
 * Relative imports for the record and every user class an instanceof check
 * names, grouped by module.
 */
function collectImports(
	record: ScannedRecord,
	fields: readonly FieldPolicy[],
	fromFile: string,
	options: EmitOptions
): Map<string, string[]> {
	const byName = new Map<string, string>([[record.record.name, record.record.filePath]]);
	const globals = new Set<string>();

	for (const policy of fields) {
		for (const alt of policy.field.check.alternatives) {
			if (alt.kind !== 'instanceof') {
				continue;
			}
			if (alt.importFrom === undefined) {
				globals.add(alt.className);
				continue;
			}
			const existing = byName.get(alt.className);
			if (existing !== undefined && existing !== alt.importFrom) {
				throw new ConfigurationError(
					record.record.fqn,
					`field ${policy.field.name} uses ${alt.className} from ${alt.importFrom}, which clashes with ${existing}`
				);
			}
			byName.set(alt.className, alt.importFrom);
		}
	}

	for (const [name, file] of byName) {
		if (RESERVED_NAMES.has(name) || globals.has(name)) {
			throw new ConfigurationError(record.record.fqn, `class ${name} from ${file} shadows a name the converter uses`);
		}
	}

	const imports = new Map<string, string[]>();
	for (const [name, file] of byName) {
		const specifier = moduleSpecifier(fromFile, file, options.importExtension);
		imports.set(specifier, [...(imports.get(specifier) ?? []), name]);
	}
	return imports;
}

function moduleSpecifier(fromFile: string, toFile: string, extension: ImportExtension): string {
	const rel = posix.relative(posix.dirname(fromFile), toFile).replace(SOURCE_EXTENSION, extension);
	return rel.startsWith('.') ? rel : `./${rel}`;
}

function quote(text: string): string {
	return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/\n/g, '\\n')}'`;
}
