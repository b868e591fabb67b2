import { InvalidRuleCombinationError, InvalidRuleError } from '../errors';
import {
	ACCESS_RULES_TYPE,
	type AccessRule,
	AccessRules,
	type InitialStateEvent,
	isAccessRule,
} from '../types';

/**
 * Picks the access rule a new room starts with.
 *
 * Direct rooms may only carry the direct rule and every other room may only
 * carry restricted or unrestricted. Without an explicit request the room gets
 * the default for its kind.
 *
 * @throws InvalidRuleCombinationError when the requested rule does not fit the room
 */
export function resolveInitialRule(
	isDirect: boolean,
	requested?: AccessRule,
): AccessRule {
	if (!requested) {
		return isDirect ? AccessRules.Direct : AccessRules.Restricted;
	}

	if (requested === AccessRules.Direct && !isDirect) {
		throw new InvalidRuleCombinationError(requested, isDirect);
	}

	if (requested !== AccessRules.Direct && isDirect) {
		throw new InvalidRuleCombinationError(requested, isDirect);
	}

	return requested;
}

/**
 * Reads the rule a client asked for from the initial state of a createRoom
 * request. Only the access rules event with an empty state key counts.
 *
 * @throws InvalidRuleError when that event does not name a known rule
 */
export function parseRequestedRule(
	initialState: InitialStateEvent[] = [],
): AccessRule | undefined {
	const event = initialState.find(
		(stateEvent) =>
			stateEvent.type === ACCESS_RULES_TYPE && (stateEvent.state_key ?? '') === '',
	);
	if (!event) {
		return undefined;
	}

	const { rule } = event.content;
	if (!isAccessRule(rule)) {
		throw new InvalidRuleError(rule);
	}

	return rule;
}

export function buildAccessRulesStateEvent(rule: AccessRule) {
	return {
		type: ACCESS_RULES_TYPE,
		state_key: '',
		content: { rule },
	} satisfies InitialStateEvent;
}
