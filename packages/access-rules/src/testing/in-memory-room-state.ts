import type { RoomID, UserID } from '@room-access/core';

import {
	ACCESS_RULES_TYPE,
	type AccessRule,
	type Membership,
	type MembershipRecord,
	type RoomStateReader,
} from '../types';

const THIRD_PARTY_INVITE_TYPE = 'm.room.third_party_invite';

type StateKey = `${string}|${string}`;

/**
 * RoomStateReader kept in memory, for tests and for hosts that already hold
 * resolved state. Later writes to the same state key replace earlier ones.
 */
export class InMemoryRoomState implements RoomStateReader {
	private readonly state = new Map<RoomID, Map<StateKey, Record<string, unknown>>>();

	private readonly history = new Map<RoomID, MembershipRecord[]>();

	setState(
		roomId: RoomID,
		eventType: string,
		stateKey: string,
		content: Record<string, unknown>,
	): this {
		const roomState =
			this.state.get(roomId) ?? new Map<StateKey, Record<string, unknown>>();
		roomState.set(`${eventType}|${stateKey}`, content);
		this.state.set(roomId, roomState);
		return this;
	}

	createRoom(roomId: RoomID, creator: UserID, rule?: AccessRule): this {
		this.setState(roomId, 'm.room.create', '', { creator });
		this.addMembership(roomId, creator, creator, 'join');
		if (rule) {
			this.setState(roomId, ACCESS_RULES_TYPE, '', { rule });
		}
		return this;
	}

	addMembership(
		roomId: RoomID,
		sender: UserID,
		stateKey: UserID,
		membership: Membership,
		thirdPartyInviteToken?: string,
	): this {
		this.setState(roomId, 'm.room.member', stateKey, { membership });
		const records = this.history.get(roomId) ?? [];
		records.push({ sender, stateKey, membership, thirdPartyInviteToken });
		this.history.set(roomId, records);
		return this;
	}

	/**
	 * Records an m.room.third_party_invite; pass an empty content to revoke it.
	 */
	addThirdPartyInvite(
		roomId: RoomID,
		token: string,
		content: Record<string, unknown> = { display_name: 'invited' },
	): this {
		return this.setState(roomId, THIRD_PARTY_INVITE_TYPE, token, content);
	}

	async getResolvedState(
		roomId: RoomID,
		eventType: string,
		stateKey: string,
	): Promise<Record<string, unknown> | null> {
		return this.state.get(roomId)?.get(`${eventType}|${stateKey}`) ?? null;
	}

	async getMembershipHistory(roomId: RoomID): Promise<MembershipRecord[]> {
		return [...(this.history.get(roomId) ?? [])];
	}

	async getThirdPartyInviteTokens(roomId: RoomID): Promise<string[]> {
		const prefix = `${THIRD_PARTY_INVITE_TYPE}|`;
		return [...(this.state.get(roomId) ?? [])]
			.filter(
				([key, content]) =>
					key.startsWith(prefix) && Object.keys(content).length > 0,
			)
			.map(([key]) => key.slice(prefix.length));
	}
}
