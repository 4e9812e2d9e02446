import { Node, ts, type Type } from 'ts-morph';
import type { FieldCheck, PrimitiveName, ValueCheck } from './types';

/**
 * Built-in classes checked with a bare `instanceof`: they are globals in
 * every module the converter could be emitted to.
 */
const GLOBAL_CLASSES = new Set([
	'Date',
	'Map',
	'Set',
	'WeakMap',
	'WeakSet',
	'RegExp',
	'Error',
	'Promise',
	'URL',
	'ArrayBuffer',
	'Uint8Array'
]);

const UNCHECKED: FieldCheck = { unchecked: true, nullable: false, alternatives: [], exact: false };

/**
 * Classifies a declared field type into the run-time checks toBean applies.
 */
export function classifyType(type: Type): FieldCheck {
	if (type.isAny() || type.isUnknown()) {
		return UNCHECKED;
	}

	const members = type.isBoolean() || !type.isUnion() ? [type] : type.getUnionTypes();
	const alternatives = new Map<string, ValueCheck>();
	let nullable = false;

	for (const member of members) {
		if (member.isNull()) {
			nullable = true;
			continue;
		}
		if (member.isUndefined()) {
			continue;
		}
		const check = classifyMember(member);
		if (!check) {
			return UNCHECKED;
		}
		alternatives.set(checkKey(check), check);
	}

	return {
		unchecked: false,
		nullable,
		alternatives: [...alternatives.values()],
		exact: !nullable && isPlainPrimitive(type.getNonNullableType())
	};
}

function classifyMember(type: Type): ValueCheck | undefined {
	const primitive = primitiveOf(type);
	if (primitive) {
		return { kind: 'typeof', type: primitive };
	}

	if (type.isArray() || type.isTuple() || type.getSymbol()?.getName() === 'ReadonlyArray') {
		return { kind: 'array' };
	}

	if (type.isTypeParameter()) {
		return undefined;
	}

	const symbol = type.getSymbol();
	if (symbol && type.isObject()) {
		const declarations = symbol.getDeclarations();
		const userClass = declarations.find(Node.isClassDeclaration);
		if (userClass && !userClass.getSourceFile().isDeclarationFile()) {
			const name = userClass.getName();
			if (name && userClass.isExported() && !userClass.isDefaultExport()) {
				return { kind: 'instanceof', className: name, importFrom: userClass.getSourceFile().getFilePath() };
			}
			return { kind: 'object' };
		}
		if (GLOBAL_CLASSES.has(symbol.getName()) && declarations.some((decl) => decl.getSourceFile().isDeclarationFile())) {
			return { kind: 'instanceof', className: symbol.getName() };
		}
	}

	if (type.getCallSignatures().length > 0 && type.getProperties().length === 0) {
		return { kind: 'typeof', type: 'function' };
	}

	if (type.isObject() || type.isIntersection() || (type.getFlags() & ts.TypeFlags.NonPrimitive) !== 0) {
		return { kind: 'object' };
	}

	return undefined;
}

function primitiveOf(type: Type): PrimitiveName | undefined {
	if (type.isString() || type.isStringLiteral() || type.isTemplateLiteral()) {
		return 'string';
	}
	if (type.isNumber() || type.isNumberLiteral()) {
		return 'number';
	}
	if (type.isBoolean() || type.isBooleanLiteral()) {
		return 'boolean';
	}
	const flags = type.getFlags();
	if (flags & ts.TypeFlags.BigIntLike) {
		return 'bigint';
	}
	if (flags & ts.TypeFlags.ESSymbolLike) {
		return 'symbol';
	}
	return undefined;
}

function isPlainPrimitive(type: Type): boolean {
	return type.isString() || type.isNumber() || type.isBoolean() || (type.getFlags() & ts.TypeFlags.BigInt) !== 0;
}

function checkKey(check: ValueCheck): string {
	switch (check.kind) {
		case 'typeof':
			return `typeof:${check.type}`;
		case 'instanceof':
			return `instanceof:${check.importFrom ?? ''}#${check.className}`;
		default:
			return check.kind;
	}
}
