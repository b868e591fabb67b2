export { logger, createLogger, type Logger } from './utils/logger';
export {
	MatrixError,
	toErrorResponse,
	type ErrorResponse,
	type MatrixErrorCode,
} from './utils/errors';
export { getErrorMessage } from './utils/get-error-message';
export { fetch, type FetchOptions, type FetchResponse } from './utils/fetch';
export {
	extractDomainFromId,
	isUserId,
	roomIdSchema,
	userIdSchema,
	type RoomID,
	type UserID,
} from './utils/identifiers';
