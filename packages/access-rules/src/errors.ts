import { MatrixError } from '@room-access/core';

import type { AccessRule } from './types';

export class InvalidRuleError extends MatrixError<'M_INVALID_PARAM'> {
	constructor(value: unknown) {
		super('M_INVALID_PARAM', `Invalid access rule ${JSON.stringify(value)}`);
		this.name = 'InvalidRuleError';
	}
}

export class InvalidRuleCombinationError extends MatrixError<'M_INVALID_PARAM'> {
	constructor(
		public readonly rule: AccessRule,
		public readonly isDirect: boolean,
	) {
		super(
			'M_INVALID_PARAM',
			`Access rule "${rule}" is not allowed in ${isDirect ? 'a direct' : 'a non-direct'} room`,
		);
		this.name = 'InvalidRuleCombinationError';
	}
}

// room state the engine needs is missing or unreadable; not a policy denial
export class StatePreconditionError extends MatrixError<'M_UNKNOWN'> {
	constructor(
		public readonly roomId: string,
		message: string,
	) {
		super('M_UNKNOWN', `${message} in room ${roomId}`);
		this.name = 'StatePreconditionError';
	}
}

export class IdentityLookupError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = 'IdentityLookupError';
	}
}
