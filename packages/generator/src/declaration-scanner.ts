import { posix } from 'node:path';
import {
	Node,
	Scope,
	SyntaxKind,
	type ClassDeclaration,
	type Decorator,
	type Expression,
	type Project,
	type PropertyDeclaration
} from 'ts-morph';
import { Logger } from '@beanmap/logging';
import { ConfigurationError, MappingMethod, formatQualifiedName } from '@beanmap/runtime';
import { classifyType } from './value-check';
import type { ClassRef, FieldMarkers, KeyMapping, ScannedField, ScannedRecord } from './types';

export const MARKERS = {
	autoToMap: 'AutoToMap',
	ignoreToMap: 'IgnoreToMap',
	ignoreToBean: 'IgnoreToBean',
	autoKeyMapping: 'AutoKeyMapping'
} as const;

const SOURCE_EXTENSION = /\.(d\.)?[cm]?tsx?$/;

export interface ScannerOptions {
	/** Absolute directory qualified names are relative to. */
	rootDir: string;
	/** Absolute directories whose files are never scanned, such as the output dir. */
	ignoreDirs?: readonly string[];
	logger?: Logger;
}

/**
 * Finds `@AutoToMap` classes in a ts-morph project and flattens each record's
 * fields across its `extends` chain.
 *
 * Marker options are read from source, so they must be literals: string
 * arrays for `exclude`, a class identifier for `mapping`, and
 * `MappingMethod.X` or a string for `method`.
 */
export class DeclarationScanner {
	private readonly log: Logger;
	private readonly rootDir: string;
	private readonly ignoreDirs: readonly string[];

	constructor(
		private readonly project: Project,
		options: ScannerOptions
	) {
		this.log = options.logger ?? new Logger('DeclarationScanner');
		this.rootDir = posix.resolve(options.rootDir);
		this.ignoreDirs = (options.ignoreDirs ?? []).map((dir) => posix.resolve(dir));
	}

	scan(): ScannedRecord[] {
		const records: ScannedRecord[] = [];
		const files = this.project
			.getSourceFiles()
			.filter((file) => !file.isDeclarationFile() && this.isScanned(file.getFilePath()))
			.sort((a, b) => a.getFilePath().localeCompare(b.getFilePath()));

		for (const file of files) {
			for (const cls of file.getClasses()) {
				const marker = cls.getDecorator(MARKERS.autoToMap);
				if (marker) {
					records.push(this.scanRecord(cls, marker));
				}
			}
		}

		this.log.debug('Scan complete', { files: files.length, records: records.length });
		return records;
	}

	private isScanned(filePath: string): boolean {
		if (!isWithin(this.rootDir, filePath)) {
			return false;
		}
		return !this.ignoreDirs.some((dir) => isWithin(dir, filePath));
	}

	private scanRecord(cls: ClassDeclaration, marker: Decorator): ScannedRecord {
		const marked = this.classRef(cls);
		const options = readObjectArgument(marker, marked.fqn);
		const exclude = readExclude(options.get('exclude'), marked.fqn);
		const mappingExpr = options.get('mapping');
		const recordClass = mappingExpr ? resolveClass(mappingExpr, marked.fqn) : cls;
		const record = recordClass === cls ? marked : this.classRef(recordClass);

		assertRecord(recordClass, record.fqn);

		const fields: ScannedField[] = [];
		for (let current: ClassDeclaration | undefined = recordClass; current; current = current.getBaseClass()) {
			const owner = current.getName() ?? '<anonymous>';
			for (const prop of current.getProperties()) {
				const field = this.scanField(prop, owner, record.fqn);
				if (field) {
					fields.push(field);
				}
			}
		}

		this.log.debug('Scanned record', {
			marked: marked.fqn,
			record: record.fqn,
			fields: fields.map((field) => field.name)
		});

		return { marked, record, exclude, fields };
	}

	private scanField(prop: PropertyDeclaration, owner: string, fqn: string): ScannedField | undefined {
		const nameNode = prop.getNameNode();
		if (!Node.isIdentifier(nameNode)) {
			if (!Node.isPrivateIdentifier(nameNode)) {
				this.log.warn('Skipped field without an identifier name', { record: fqn, field: nameNode.getText() });
			}
			return undefined;
		}
		if (prop.isStatic() || prop.isReadonly() || prop.isAbstract() || prop.getScope() !== Scope.Public) {
			return undefined;
		}

		const name = nameNode.getText();
		const type = prop.getType();
		return {
			name,
			typeText: prop.getTypeNode()?.getText() ?? type.getText(prop),
			check: classifyType(type),
			declaringClass: owner,
			markers: readFieldMarkers(prop, `${fqn}.${name}`)
		};
	}

	private classRef(cls: ClassDeclaration): ClassRef {
		const filePath = cls.getSourceFile().getFilePath();
		const name = cls.getName();
		if (!name) {
			throw new ConfigurationError(filePath, 'record class must be named');
		}

		const modulePath = posix.relative(this.rootDir, filePath).replace(SOURCE_EXTENSION, '');
		const fqn = formatQualifiedName(modulePath, name);
		if (modulePath.startsWith('..')) {
			throw new ConfigurationError(fqn, `source file is outside ${this.rootDir}`);
		}

		const moduleDir = posix.dirname(modulePath);
		return { name, filePath, fqn, moduleDir: moduleDir === '.' ? '' : moduleDir };
	}
}

/**
 * The converter imports the record by name and builds it with `new T()`, which
 * runs the nearest constructor in the chain.
 */
function assertRecord(cls: ClassDeclaration, fqn: string): void {
	if (cls.isAbstract()) {
		throw new ConfigurationError(fqn, 'record class is abstract');
	}
	if (!cls.isExported() || cls.isDefaultExport()) {
		throw new ConfigurationError(fqn, 'record class must be a named export');
	}

	for (let current: ClassDeclaration | undefined = cls; current; current = current.getBaseClass()) {
		const constructors = current.getConstructors();
		if (constructors.length === 0) {
			continue;
		}
		const required = constructors.every((ctor) =>
			ctor.getParameters().some((param) => !param.isOptional() && !param.hasInitializer() && !param.isRestParameter())
		);
		if (required) {
			throw new ConfigurationError(fqn, `constructor of ${current.getName() ?? 'a base class'} has required parameters`);
		}
		return;
	}
}

function isWithin(dir: string, filePath: string): boolean {
	const rel = posix.relative(dir, filePath);
	return rel !== '' && !rel.startsWith('..') && !posix.isAbsolute(rel);
}

/**
 * Property initializers of a decorator's object-literal argument, by name.
 */
function readObjectArgument(decorator: Decorator, fqn: string): Map<string, Expression> {
	const options = new Map<string, Expression>();
	const [arg] = decorator.getArguments();
	if (!arg) {
		return options;
	}
	if (!Node.isObjectLiteralExpression(arg)) {
		throw new ConfigurationError(fqn, `@${decorator.getName()} options must be an object literal`);
	}

	for (const property of arg.getProperties()) {
		if (!Node.isPropertyAssignment(property)) {
			throw new ConfigurationError(fqn, `@${decorator.getName()} option '${property.getText()}' must be written as key: value`);
		}
		const initializer = property.getInitializer();
		if (initializer) {
			options.set(property.getName(), initializer);
		}
	}
	return options;
}

function readExclude(expr: Expression | undefined, fqn: string): string[] {
	if (!expr) {
		return [];
	}
	if (!Node.isArrayLiteralExpression(expr)) {
		throw new ConfigurationError(fqn, 'exclude must be an array of string literals');
	}
	return expr.getElements().map((element) => {
		const value = readString(element);
		if (value === undefined) {
			throw new ConfigurationError(fqn, 'exclude must be an array of string literals');
		}
		return value;
	});
}

function resolveClass(expr: Expression, fqn: string): ClassDeclaration {
	if (Node.isIdentifier(expr)) {
		const symbol = expr.getSymbol();
		const target = symbol?.getAliasedSymbol() ?? symbol;
		const declaration = target?.getDeclarations().find(Node.isClassDeclaration);
		if (declaration) {
			return declaration;
		}
	}
	throw new ConfigurationError(fqn, `mapping '${expr.getText()}' does not name a class`);
}

function readFieldMarkers(prop: PropertyDeclaration, where: string): FieldMarkers {
	const keyMarker = prop.getDecorator(MARKERS.autoKeyMapping);
	return {
		ignoreToMap: prop.getDecorator(MARKERS.ignoreToMap) !== undefined,
		ignoreToBean: prop.getDecorator(MARKERS.ignoreToBean) !== undefined,
		keyMapping: keyMarker ? readKeyMapping(keyMarker, where) : undefined
	};
}

function readKeyMapping(decorator: Decorator, where: string): KeyMapping {
	const options = readObjectArgument(decorator, where);

	const ignoreExpr = options.get('ignore');
	let ignore = false;
	if (ignoreExpr) {
		const kind = ignoreExpr.getKind();
		if (kind !== SyntaxKind.TrueKeyword && kind !== SyntaxKind.FalseKeyword) {
			throw new ConfigurationError(where, 'ignore must be true or false');
		}
		ignore = kind === SyntaxKind.TrueKeyword;
	}

	const methodExpr = options.get('method');
	let method: MappingMethod = MappingMethod.BOTH;
	if (methodExpr) {
		const name = Node.isPropertyAccessExpression(methodExpr) ? methodExpr.getName() : readString(methodExpr);
		const resolved = Object.values(MappingMethod).find((value) => value === name);
		if (!resolved) {
			throw new ConfigurationError(where, `unknown method '${methodExpr.getText()}'`);
		}
		method = resolved;
	}

	const targetExpr = options.get('target');
	let target: string | undefined;
	if (targetExpr) {
		target = readString(targetExpr);
		if (target === undefined) {
			throw new ConfigurationError(where, 'target must be a string literal');
		}
	}

	return { ignore, method, target };
}

function readString(node: Node): string | undefined {
	if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
		return node.getLiteralText();
	}
	return undefined;
}
