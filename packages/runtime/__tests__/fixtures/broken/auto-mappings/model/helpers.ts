export class NotAConverter {
	toMap(): Record<string, unknown> {
		return {};
	}

	toBean(): unknown {
		return undefined;
	}
}
