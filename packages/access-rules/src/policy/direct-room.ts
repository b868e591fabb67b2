import type { UserID } from '@room-access/core';
import { z } from 'zod';

import type { DirectRoomContext, MembershipRecord } from '../types';

const DIRECT_ROOM_SIZE = 2;

const redeemedInviteSchema = z.object({
	third_party_invite: z.object({
		signed: z.object({ token: z.string().min(1) }),
	}),
});

/**
 * Token of the third party invite a member event's content redeems, if any.
 */
export function redeemedInviteToken(
	content: Record<string, unknown>,
): string | undefined {
	const parsed = redeemedInviteSchema.safeParse(content);
	return parsed.success ? parsed.data.third_party_invite.signed.token : undefined;
}

/**
 * Folds a room's membership history into the closed set of a direct room: the
 * creator plus the first identity ever invited or joined. Later records can
 * never grow the set and leaving never shrinks it.
 */
export function closedSetFor(
	creator: UserID,
	history: readonly MembershipRecord[],
): ReadonlySet<UserID> {
	return history.reduce<Set<UserID>>((closedSet, record) => {
		if (record.membership !== 'invite' && record.membership !== 'join') {
			return closedSet;
		}

		if (closedSet.size < DIRECT_ROOM_SIZE) {
			closedSet.add(record.stateKey);
		}

		return closedSet;
	}, new Set([creator]));
}

/**
 * Third party invites no member event has redeemed yet. Each one holds a seat
 * for whoever turns out to own the address.
 */
export function pendingThirdPartyInvites({
	history,
	thirdPartyInviteTokens,
}: DirectRoomContext): string[] {
	const redeemed = new Set(
		history.flatMap(({ thirdPartyInviteToken }) =>
			thirdPartyInviteToken ? [thirdPartyInviteToken] : [],
		),
	);
	return thirdPartyInviteTokens.filter((token) => !redeemed.has(token));
}

export function hasVacancy(context: DirectRoomContext): boolean {
	const seated = closedSetFor(context.creator, context.history).size;
	return seated + pendingThirdPartyInvites(context).length < DIRECT_ROOM_SIZE;
}

export function isInviteAllowed(
	actingUser: UserID,
	targetUser: UserID,
	context: DirectRoomContext,
	redeemedToken?: string,
): boolean {
	const { creator, history } = context;
	if (targetUser === creator || closedSetFor(creator, history).has(targetUser)) {
		return true;
	}

	// a pending third party invite holds the free seat unless this invite redeems it
	const pending = pendingThirdPartyInvites(context).filter(
		(token) => token !== redeemedToken,
	);
	if (pending.length > 0) {
		return false;
	}

	// the invite being checked takes the free seat if there is one
	const closedSet = closedSetFor(creator, [
		...history,
		{ sender: actingUser, stateKey: targetUser, membership: 'invite' },
	]);

	return closedSet.has(targetUser);
}
