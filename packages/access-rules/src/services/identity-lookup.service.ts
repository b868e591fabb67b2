import {
	type RoomID,
	createLogger,
	fetch,
	getErrorMessage,
} from '@room-access/core';
import { singleton } from 'tsyringe';
import { z } from 'zod';

import { IdentityLookupError } from '../errors';
import { hasVacancy } from '../policy/direct-room';
import { isDomainAllowed } from '../policy/domain-policy';
import { type AccessRule, AccessRules, type ThirdPartyTarget } from '../types';
import { ConfigService } from './config.service';
import { RuleStoreService } from './rule-store.service';

const infoResponseSchema = z.object({
	hs: z.string().min(1),
});

export type ThirdPartyInviteCheck =
	| { allowed: true; serverName: string }
	| {
			allowed: false;
			cause: 'lookup_failed' | 'server_forbidden' | 'direct_room_full';
	  };

@singleton()
export class IdentityLookupService {
	private readonly logger = createLogger('IdentityLookupService');

	constructor(
		private readonly configService: ConfigService,
		private readonly ruleStore: RuleStoreService,
	) {}

	private infoUrl({ medium, address }: ThirdPartyTarget): URL {
		const url = new URL(
			'/_matrix/identity/api/v1/info',
			this.configService.getConfig('idServer'),
		);
		url.searchParams.set('medium', medium);
		url.searchParams.set('address', address);
		return url;
	}

	/**
	 * Asks the identity server which homeserver the address belongs, or would
	 * belong, to.
	 *
	 * @throws IdentityLookupError on timeouts, transport errors, non-2xx answers
	 * and bodies without a server name
	 */
	async lookupHomeserver(target: ThirdPartyTarget): Promise<string> {
		const timeout = this.configService.getConfig('identityLookupTimeout');

		let body: unknown;
		try {
			const response = await fetch<unknown>(this.infoUrl(target), {
				method: 'GET',
				timeout,
			});
			if (!response.ok) {
				response.discard();
				throw new Error(`identity server answered ${response.status}`);
			}
			body = await response.json();
		} catch (error) {
			throw new IdentityLookupError(
				`Identity lookup for ${target.medium} failed: ${getErrorMessage(error)}`,
				error,
			);
		}

		const parsed = infoResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new IdentityLookupError(
				`Identity server returned no homeserver for ${target.medium}`,
			);
		}

		return parsed.data.hs;
	}

	async checkThirdPartyInvite(
		roomId: RoomID,
		target: ThirdPartyTarget,
		rule: AccessRule,
	): Promise<ThirdPartyInviteCheck> {
		let serverName: string;
		try {
			serverName = await this.lookupHomeserver(target);
		} catch (error) {
			if (!(error instanceof IdentityLookupError)) {
				throw error;
			}
			// fail closed: without a server name there is nothing to evaluate
			this.logger.warn({
				msg: 'Identity lookup failed, denying third party invite',
				roomId,
				medium: target.medium,
				err: error,
			});
			return { allowed: false, cause: 'lookup_failed' };
		}

		if (!isDomainAllowed(serverName, rule, this.configService.forbiddenDomains)) {
			return { allowed: false, cause: 'server_forbidden' };
		}

		if (rule === AccessRules.Direct) {
			const context = await this.ruleStore.getDirectRoomContext(roomId);
			if (!hasVacancy(context)) {
				return { allowed: false, cause: 'direct_room_full' };
			}
		}

		return { allowed: true, serverName };
	}

	async isThirdPartyInviteAllowed(
		roomId: RoomID,
		target: ThirdPartyTarget,
		rule: AccessRule,
	): Promise<boolean> {
		const check = await this.checkThirdPartyInvite(roomId, target, rule);
		return check.allowed;
	}
}
