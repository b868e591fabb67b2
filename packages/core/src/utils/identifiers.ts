import { z } from 'zod';

export const roomIdSchema = z.string().startsWith('!').brand('RoomID');

export type RoomID = z.infer<typeof roomIdSchema>;

export const userIdSchema = z
	.string()
	.regex(/^@[^:]+:.+$/, 'User ID must look like @localpart:server')
	.brand('UserID');

export type UserID = z.infer<typeof userIdSchema>;

export function extractDomainFromId(identifier: string) {
	const idx = identifier.indexOf(':');
	if (idx === -1) {
		throw new Error(`Invalid identifier ${identifier}, no domain found`);
	}
	return identifier.substring(idx + 1);
}

export function isUserId(value: string): value is UserID {
	return userIdSchema.safeParse(value).success;
}
