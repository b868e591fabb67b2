import {
	type RoomID,
	type UserID,
	createLogger,
	extractDomainFromId,
	isUserId,
} from '@room-access/core';
import { singleton } from 'tsyringe';

import { isInviteAllowed, redeemedInviteToken } from '../policy/direct-room';
import { isDomainAllowed } from '../policy/domain-policy';
import { parseRequestedRule, resolveInitialRule } from '../policy/rule-validator';
import {
	type AccessDecision,
	type AccessRule,
	AccessRules,
	type Membership,
	type MembershipChangeRequest,
	type MembershipEventInput,
	type RoomAccessHooks,
	type RoomCreationRequest,
	type ThirdPartyTarget,
	isThirdPartyTarget,
} from '../types';
import { ConfigService } from './config.service';
import { IdentityLookupService } from './identity-lookup.service';
import { RuleStoreService } from './rule-store.service';

export const DenyReasons = {
	ServerForbidden: 'target server is not permitted',
	DirectRoomClosed: 'direct rooms are limited to their original participants',
	LookupFailed: 'unable to resolve the invited address to a server',
} as const;

const MEMBERSHIPS: readonly Membership[] = ['invite', 'join', 'leave', 'ban', 'knock'];

function isMembership(value: unknown): value is Membership {
	return MEMBERSHIPS.some((membership) => membership === value);
}

function deny(rule: AccessRule, reason: string): AccessDecision {
	return { allowed: false, rule, reason, errcode: 'M_FORBIDDEN', status: 403 };
}

@singleton()
export class AccessDecisionService implements RoomAccessHooks {
	private readonly logger = createLogger('AccessDecisionService');

	constructor(
		private readonly configService: ConfigService,
		private readonly ruleStore: RuleStoreService,
		private readonly identityLookupService: IdentityLookupService,
	) {}

	/**
	 * Must run before the create event is finalized; the host persists the
	 * returned rule alongside the room.
	 */
	async onRoomCreate(request: RoomCreationRequest): Promise<AccessRule> {
		const requested = parseRequestedRule(request.initialState);
		const rule = resolveInitialRule(request.isDirect, requested);

		const invitees = request.invite ?? [];
		if (rule === AccessRules.Direct && invitees.length > 1) {
			this.logger.warn({
				msg: 'Direct room created with several invitees, only the first one is kept as a participant',
				creator: request.creator,
				invitees,
			});
		}

		this.logger.debug({
			msg: 'Resolved initial access rule',
			creator: request.creator,
			isDirect: request.isDirect,
			requested,
			rule,
		});

		return rule;
	}

	async onMembershipEvent(
		change: MembershipChangeRequest,
	): Promise<AccessDecision> {
		// only the invite step is gated
		if (change.membership !== 'invite') {
			return { allowed: true };
		}

		const rule = await this.ruleStore.getRule(change.roomId);

		const decision = isThirdPartyTarget(change.target)
			? await this.decideThirdPartyInvite(change.roomId, change.target, rule)
			: await this.decideInvite(change, change.target, rule);

		if (!decision.allowed) {
			this.logger.info({
				msg: 'Invite denied by access rules',
				roomId: change.roomId,
				sender: change.sender,
				rule,
				reason: decision.reason,
			});
		}

		return decision;
	}

	async checkEventAllowed(event: MembershipEventInput): Promise<AccessDecision> {
		if (event.type !== 'm.room.member') {
			return { allowed: true };
		}

		const { membership } = event.content;
		if (!isMembership(membership) || !event.state_key || !isUserId(event.state_key)) {
			// malformed member events are left to the host's auth rules
			return { allowed: true };
		}

		return this.onMembershipEvent({
			roomId: event.room_id,
			sender: event.sender,
			target: event.state_key,
			membership,
			thirdPartyInviteToken: redeemedInviteToken(event.content),
		});
	}

	private async decideInvite(
		{ roomId, sender, thirdPartyInviteToken }: MembershipChangeRequest,
		target: UserID,
		rule: AccessRule,
	): Promise<AccessDecision> {
		switch (rule) {
			case AccessRules.Unrestricted:
				return { allowed: true, rule };

			case AccessRules.Restricted: {
				const allowed = isDomainAllowed(
					extractDomainFromId(target),
					rule,
					this.configService.forbiddenDomains,
				);
				return allowed
					? { allowed: true, rule }
					: deny(rule, DenyReasons.ServerForbidden);
			}

			case AccessRules.Direct: {
				const context = await this.ruleStore.getDirectRoomContext(roomId);
				return isInviteAllowed(sender, target, context, thirdPartyInviteToken)
					? { allowed: true, rule }
					: deny(rule, DenyReasons.DirectRoomClosed);
			}
		}
	}

	private async decideThirdPartyInvite(
		roomId: RoomID,
		target: ThirdPartyTarget,
		rule: AccessRule,
	): Promise<AccessDecision> {
		const check = await this.identityLookupService.checkThirdPartyInvite(
			roomId,
			target,
			rule,
		);

		if (check.allowed) {
			return { allowed: true, rule };
		}

		switch (check.cause) {
			case 'lookup_failed':
				return deny(rule, DenyReasons.LookupFailed);
			case 'server_forbidden':
				return deny(rule, DenyReasons.ServerForbidden);
			case 'direct_room_full':
				return deny(rule, DenyReasons.DirectRoomClosed);
		}
	}
}
