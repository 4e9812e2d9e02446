import { describe, expect, test } from 'vitest';
import { resolveFieldPolicies, type FieldMarkers, type ScannedField, type ScannedRecord } from '../src/index';

const ref = { name: 'User', filePath: '/src/model/user.ts', fqn: 'model/user#User', moduleDir: 'model' };

function field(name: string, markers: Partial<FieldMarkers> = {}): ScannedField {
	return {
		name,
		typeText: 'string',
		check: { unchecked: false, nullable: false, alternatives: [{ kind: 'typeof', type: 'string' }], exact: true },
		declaringClass: 'User',
		markers: { ignoreToMap: false, ignoreToBean: false, ...markers }
	};
}

function record(fields: ScannedField[], exclude: string[] = []): ScannedRecord {
	return { marked: ref, record: ref, exclude, fields };
}

describe('resolveFieldPolicies', () => {
	test('should include unmarked fields in both directions under their own name', () => {
		const [policy] = resolveFieldPolicies(record([field('name')]));

		expect(policy).toMatchObject({ toMap: { include: true }, toBean: { include: true }, mapKey: 'name' });
	});

	test('should exclude listed fields in both directions', () => {
		const [policy] = resolveFieldPolicies(record([field('password')], ['password']));

		expect(policy?.toMap).toEqual({ include: false, reason: 'exclude-list' });
		expect(policy?.toBean).toEqual({ include: false, reason: 'exclude-list' });
	});

	test('should apply direction markers to one direction only', () => {
		const [token, count] = resolveFieldPolicies(
			record([field('token', { ignoreToMap: true }), field('count', { ignoreToBean: true })])
		);

		expect(token?.toMap).toEqual({ include: false, reason: 'direction-marker' });
		expect(token?.toBean).toEqual({ include: true });
		expect(count?.toMap).toEqual({ include: true });
		expect(count?.toBean).toEqual({ include: false, reason: 'direction-marker' });
	});

	test('should ignore by key mapping in the chosen direction', () => {
		const [both, toMap, toBean] = resolveFieldPolicies(
			record([
				field('a', { keyMapping: { ignore: true, method: 'BOTH' } }),
				field('b', { keyMapping: { ignore: true, method: 'TO_MAP' } }),
				field('c', { keyMapping: { ignore: true, method: 'TO_BEAN' } })
			])
		);

		expect([both?.toMap.include, both?.toBean.include]).toEqual([false, false]);
		expect([toMap?.toMap.include, toMap?.toBean.include]).toEqual([false, true]);
		expect([toBean?.toMap.include, toBean?.toBean.include]).toEqual([true, false]);
	});

	test('should not ignore when the key mapping only sets a method', () => {
		const [policy] = resolveFieldPolicies(record([field('a', { keyMapping: { ignore: false, method: 'TO_MAP' } })]));

		expect(policy?.toMap).toEqual({ include: true });
	});

	test('should report the direction marker before other reasons', () => {
		const [policy] = resolveFieldPolicies(
			record([field('secret', { ignoreToMap: true, keyMapping: { ignore: true, method: 'BOTH' } })], ['secret'])
		);

		expect(policy?.toMap).toEqual({ include: false, reason: 'direction-marker' });
		expect(policy?.toBean).toEqual({ include: false, reason: 'key-mapping' });
	});

	test('should rename only the toMap key', () => {
		const [policy] = resolveFieldPolicies(
			record([field('name', { keyMapping: { ignore: false, method: 'BOTH', target: 'userName' } })])
		);

		expect(policy?.mapKey).toBe('userName');
		expect(policy?.toBean).toEqual({ include: true });
	});

	test('should fall back to the field name for a blank target', () => {
		const [policy] = resolveFieldPolicies(
			record([field('name', { keyMapping: { ignore: false, method: 'BOTH', target: '  ' } })])
		);

		expect(policy?.mapKey).toBe('name');
	});

	test('should keep scanner order', () => {
		const policies = resolveFieldPolicies(record([field('b'), field('a'), field('c')]));

		expect(policies.map((policy) => policy.field.name)).toEqual(['b', 'a', 'c']);
	});
});
