import { type RoomID, createLogger, getErrorMessage, userIdSchema } from '@room-access/core';
import { inject, singleton } from 'tsyringe';

import { StatePreconditionError } from '../errors';
import {
	ACCESS_RULES_TYPE,
	type AccessRule,
	type DirectRoomContext,
	type RoomStateReader,
	isAccessRule,
} from '../types';

@singleton()
export class RuleStoreService {
	private readonly logger = createLogger('RuleStoreService');

	constructor(
		@inject('RoomStateReader')
		private readonly stateReader: RoomStateReader,
	) {}

	async getRule(roomId: RoomID): Promise<AccessRule> {
		const content = await this.read(
			() => this.stateReader.getResolvedState(roomId, ACCESS_RULES_TYPE, ''),
			roomId,
		);

		if (!content) {
			throw new StatePreconditionError(roomId, 'No resolved access rule');
		}

		const { rule } = content;
		if (!isAccessRule(rule)) {
			throw new StatePreconditionError(
				roomId,
				`Unknown access rule ${JSON.stringify(rule)}`,
			);
		}

		return rule;
	}

	async getDirectRoomContext(roomId: RoomID): Promise<DirectRoomContext> {
		const [createContent, history, thirdPartyInviteTokens] = await this.read(
			() =>
				Promise.all([
					this.stateReader.getResolvedState(roomId, 'm.room.create', ''),
					this.stateReader.getMembershipHistory(roomId),
					this.stateReader.getThirdPartyInviteTokens(roomId),
				]),
			roomId,
		);

		if (!createContent) {
			throw new StatePreconditionError(roomId, 'No resolved create event');
		}

		// newer room versions drop content.creator; the creator's own join comes first
		const creator = userIdSchema.safeParse(createContent.creator);
		if (creator.success) {
			return { creator: creator.data, history, thirdPartyInviteTokens };
		}

		const [first] = history;
		if (first?.membership === 'join' && first.sender === first.stateKey) {
			return { creator: first.sender, history, thirdPartyInviteTokens };
		}

		throw new StatePreconditionError(roomId, 'Unable to determine room creator');
	}

	private async read<T>(fn: () => Promise<T>, roomId: RoomID): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			this.logger.error({ msg: 'Failed to read room state', roomId, err: error });
			throw new StatePreconditionError(
				roomId,
				`Failed to read room state: ${getErrorMessage(error)}`,
			);
		}
	}
}
