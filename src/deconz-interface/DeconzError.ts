export type DeconzErrorKind = 'HttpError' | 'IdParseError' | 'ResponseParseError' | 'InvalidArgument';

export class DeconzError extends Error {
	public readonly kind: DeconzErrorKind;
	public readonly status?: number;

	constructor(kind: DeconzErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
		super(message, { cause: options.cause });
		this.name = 'DeconzError';
		this.kind = kind;
		this.status = options.status;
	}
}
