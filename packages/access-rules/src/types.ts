import type { RoomID, UserID } from '@room-access/core';

export const ACCESS_RULES_TYPE = 'im.vector.room.access_rules';

export const AccessRules = {
	Restricted: 'restricted',
	Unrestricted: 'unrestricted',
	Direct: 'direct',
} as const;

export type AccessRule = (typeof AccessRules)[keyof typeof AccessRules];

export const ACCESS_RULE_VALUES: readonly AccessRule[] = Object.values(AccessRules);

export function isAccessRule(value: unknown): value is AccessRule {
	return ACCESS_RULE_VALUES.some((rule) => rule === value);
}

export type AccessRulesContent = {
	rule: AccessRule;
};

export type Membership = 'invite' | 'join' | 'leave' | 'ban' | 'knock';

export type ThirdPartyMedium = 'email' | 'msisdn';

export type ThirdPartyTarget = {
	medium: ThirdPartyMedium;
	address: string;
};

export type InitialStateEvent = {
	type: string;
	state_key?: string;
	content: Record<string, unknown>;
};

export type RoomCreationRequest = {
	creator: UserID;
	isDirect: boolean;
	initialState?: InitialStateEvent[];
	// user IDs invited as part of the creation request
	invite?: UserID[];
};

export type MembershipChangeRequest = {
	roomId: RoomID;
	sender: UserID;
	target: UserID | ThirdPartyTarget;
	membership: Membership;
	// token of the m.room.third_party_invite this invite redeems, if any
	thirdPartyInviteToken?: string;
};

export type MembershipRecord = {
	sender: UserID;
	stateKey: UserID;
	membership: Membership;
	thirdPartyInviteToken?: string;
};

export type DirectRoomContext = {
	creator: UserID;
	history: MembershipRecord[];
	thirdPartyInviteTokens: string[];
};

export type AccessDecision =
	| {
			allowed: true;
			rule?: AccessRule;
	  }
	| {
			allowed: false;
			rule: AccessRule;
			reason: string;
			errcode: 'M_FORBIDDEN';
			status: 403;
	  };

// the subset of a PDU the per-event hook needs
export type MembershipEventInput = {
	type: string;
	room_id: RoomID;
	sender: UserID;
	state_key?: string;
	content: Record<string, unknown>;
};

/**
 * Hooks the host pipeline calls before a room is materialized and before a
 * membership event is persisted.
 */
export interface RoomAccessHooks {
	onRoomCreate(request: RoomCreationRequest): Promise<AccessRule>;
	onMembershipEvent(change: MembershipChangeRequest): Promise<AccessDecision>;
}

/**
 * Read port over the host's resolved room state.
 */
export interface RoomStateReader {
	getResolvedState(
		roomId: RoomID,
		eventType: string,
		stateKey: string,
	): Promise<Record<string, unknown> | null>;

	// every m.room.member event of the room, oldest first
	getMembershipHistory(roomId: RoomID): Promise<MembershipRecord[]>;

	// state keys of the room's m.room.third_party_invite events that are not revoked
	getThirdPartyInviteTokens(roomId: RoomID): Promise<string[]>;
}

export function isThirdPartyTarget(
	target: MembershipChangeRequest['target'],
): target is ThirdPartyTarget {
	return typeof target !== 'string';
}
