import { type RoomID, userIdSchema } from '@room-access/core';
import type { Collection } from 'mongodb';
import { inject, singleton } from 'tsyringe';
import { z } from 'zod';

import { redeemedInviteToken } from '../policy/direct-room';
import type { MembershipRecord, RoomStateReader } from '../types';

export type RoomEvent = {
	room_id: string;
	type: string;
	state_key?: string;
	sender: string;
	content: Record<string, unknown>;
	depth: number;
	origin_server_ts: number;
};

export type RoomEventStore = {
	_id: string;
	event: RoomEvent;
};

const membershipRecordSchema = z
	.object({
		sender: userIdSchema,
		state_key: userIdSchema,
		content: z
			.object({
				membership: z.enum(['invite', 'join', 'leave', 'ban', 'knock']),
			})
			.passthrough(),
	})
	.transform(
		(event): MembershipRecord => ({
			sender: event.sender,
			stateKey: event.state_key,
			membership: event.content.membership,
			thirdPartyInviteToken: redeemedInviteToken(event.content),
		}),
	);

/**
 * Reads room state out of the host's event collection. The event with the
 * greatest depth for a (room, type, state key) triple is taken as resolved.
 */
@singleton()
export class RoomStateRepository implements RoomStateReader {
	constructor(
		@inject('RoomEventCollection')
		private readonly collection: Collection<RoomEventStore>,
	) {}

	async getResolvedState(
		roomId: RoomID,
		eventType: string,
		stateKey: string,
	): Promise<Record<string, unknown> | null> {
		const stored = await this.collection.findOne(
			{
				'event.room_id': roomId,
				'event.type': eventType,
				'event.state_key': stateKey,
			},
			{ sort: { 'event.depth': -1 } },
		);

		return stored?.event.content ?? null;
	}

	async getMembershipHistory(roomId: RoomID): Promise<MembershipRecord[]> {
		const events = await this.collection
			.find(
				{ 'event.room_id': roomId, 'event.type': 'm.room.member' },
				{ sort: { 'event.depth': 1, 'event.origin_server_ts': 1 } },
			)
			.toArray();

		return events.flatMap(({ event }) => {
			const parsed = membershipRecordSchema.safeParse(event);
			return parsed.success ? [parsed.data] : [];
		});
	}

	async getThirdPartyInviteTokens(roomId: RoomID): Promise<string[]> {
		const events = await this.collection
			.find(
				{ 'event.room_id': roomId, 'event.type': 'm.room.third_party_invite' },
				{ sort: { 'event.depth': 1 } },
			)
			.toArray();

		// later events for a token replace earlier ones; an empty content revokes it
		const latest = events.reduce((byToken, { event }) => {
			if (event.state_key) {
				byToken.set(event.state_key, event.content);
			}
			return byToken;
		}, new Map<string, Record<string, unknown>>());

		return [...latest]
			.filter(([, content]) => Object.keys(content).length > 0)
			.map(([token]) => token);
	}
}
