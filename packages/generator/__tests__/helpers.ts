import { Project, ts } from 'ts-morph';
import { Logger, type LogObject, type Transport } from '@beanmap/logging';

export function createProject(files: Record<string, string>): Project {
	const project = new Project({
		useInMemoryFileSystem: true,
		compilerOptions: { strict: true, target: ts.ScriptTarget.ES2022, experimentalDecorators: true }
	});
	for (const [path, text] of Object.entries(files)) {
		project.createSourceFile(path, text);
	}
	return project;
}

export function captureLogger(name = 'Generator'): { logger: Logger; logs: LogObject[] } {
	const logs: LogObject[] = [];
	const transport: Transport = {
		write(obj: LogObject) {
			logs.push(obj);
		},
		async flush() {},
		async close() {}
	};
	return { logger: new Logger(name, { level: 'debug', transports: [transport] }), logs };
}

export const ENTITY_SOURCE = `
export class Entity {
	id = 0;
	readonly kind = 'entity';
	static table = 'entities';
	protected version = 1;
	#secret = '';
	createdAt: Date = new Date(0);
}
`;

export const ADDRESS_SOURCE = `
export class Address {
	city = '';
}
`;

export const USER_SOURCE = `
import { AutoToMap, AutoKeyMapping, IgnoreToMap, IgnoreToBean, MappingMethod } from '@beanmap/runtime';
import { Entity } from './base';
import { Address } from './address';

export enum Role {
	Admin = 'admin',
	Member = 'member'
}

@AutoToMap({ exclude: ['password'] })
export class User extends Entity {
	@AutoKeyMapping({ target: 'userName' })
	name = '';
	email: string | null = null;
	password = '';
	@IgnoreToMap()
	token = '';
	@IgnoreToBean()
	loginCount = 0;
	@AutoKeyMapping({ ignore: true, method: MappingMethod.TO_BEAN })
	lastSeen?: number;
	tags: string[] = [];
	role: Role = Role.Member;
	address?: Address;
	meta: unknown = undefined;
}
`;

export const MODEL_FILES = {
	'/src/model/base.ts': ENTITY_SOURCE,
	'/src/model/address.ts': ADDRESS_SOURCE,
	'/src/model/user.ts': USER_SOURCE
};
