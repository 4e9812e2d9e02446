import { ConversionError, type MappingConvert } from '../../src/index';
import { Admin, User } from './model/user';

function readNumber(typeName: string, field: string, data: Readonly<Record<string, unknown>>): number | undefined {
	const value = data[field];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== 'number') {
		throw new ConversionError(typeName, field, 'number', value);
	}
	return value;
}

/**
 * Hand-written converter used to exercise the registry and facade.
 */
export class UserConverter implements MappingConvert<User> {
	readonly target = User;

	toMap(entity: User | null | undefined): Record<string, unknown> {
		return entity ? { id: entity.id, name: entity.name } : {};
	}

	toBean(data: Readonly<Record<string, unknown>>): User {
		const bean = new User();
		bean.id = readNumber('User', 'id', data) ?? bean.id;
		const name = data['name'];
		if (typeof name === 'string') {
			bean.name = name;
		}
		return bean;
	}
}

export class AdminConverter implements MappingConvert<Admin> {
	readonly target = Admin;

	toMap(entity: Admin | null | undefined): Record<string, unknown> {
		return entity ? { id: entity.id, level: entity.level } : {};
	}

	toBean(data: Readonly<Record<string, unknown>>): Admin {
		const bean = new Admin();
		bean.id = readNumber('Admin', 'id', data) ?? bean.id;
		bean.level = readNumber('Admin', 'level', data) ?? bean.level;
		return bean;
	}
}
