export type MatrixErrorCode =
	| 'M_FORBIDDEN'
	| 'M_INVALID_PARAM'
	| 'M_NOT_FOUND'
	| 'M_UNKNOWN';

const statusByCode: Record<MatrixErrorCode, 400 | 403 | 404 | 500> = {
	M_FORBIDDEN: 403,
	M_INVALID_PARAM: 400,
	M_NOT_FOUND: 404,
	M_UNKNOWN: 500,
};

export class MatrixError<TCode extends MatrixErrorCode = MatrixErrorCode> extends Error {
	public readonly status: 400 | 403 | 404 | 500;

	constructor(
		public readonly code: TCode,
		message: string,
	) {
		super(message);
		this.name = 'MatrixError';
		this.status = statusByCode[code];
	}
}

export type ErrorResponse = {
	status: number;
	body: {
		errcode: MatrixErrorCode;
		error: string;
	};
};

// what the host sends back to the client for a rejected request
export function toErrorResponse(error: unknown): ErrorResponse {
	if (error instanceof MatrixError) {
		return {
			status: error.status,
			body: { errcode: error.code, error: error.message },
		};
	}

	return {
		status: 500,
		body: {
			errcode: 'M_UNKNOWN',
			error: 'Internal server error while processing request',
		},
	};
}
