import 'reflect-metadata';

export {
	ACCESS_RULES_TYPE,
	ACCESS_RULE_VALUES,
	AccessRules,
	isAccessRule,
	isThirdPartyTarget,
} from './types';
export type {
	AccessDecision,
	AccessRule,
	AccessRulesContent,
	DirectRoomContext,
	InitialStateEvent,
	Membership,
	MembershipChangeRequest,
	MembershipEventInput,
	MembershipRecord,
	RoomAccessHooks,
	RoomCreationRequest,
	RoomStateReader,
	ThirdPartyMedium,
	ThirdPartyTarget,
} from './types';

export {
	IdentityLookupError,
	InvalidRuleCombinationError,
	InvalidRuleError,
	StatePreconditionError,
} from './errors';

export {
	buildAccessRulesStateEvent,
	parseRequestedRule,
	resolveInitialRule,
} from './policy/rule-validator';
export { isDomainAllowed } from './policy/domain-policy';
export {
	closedSetFor,
	hasVacancy,
	isInviteAllowed,
	pendingThirdPartyInvites,
	redeemedInviteToken,
} from './policy/direct-room';

export {
	AccessDecisionService,
	DenyReasons,
} from './services/access-decision.service';
export {
	AppConfigSchema,
	ConfigService,
	type AppConfig,
	type AppConfigInput,
} from './services/config.service';
export { DatabaseConnectionService } from './services/database-connection.service';
export {
	IdentityLookupService,
	type ThirdPartyInviteCheck,
} from './services/identity-lookup.service';
export { RuleStoreService } from './services/rule-store.service';
export {
	RoomStateRepository,
	type RoomEvent,
	type RoomEventStore,
} from './repositories/room-state.repository';
export { fromConfigFile, loadConfigFile, type ConfigFile } from './config/load-config';
export { InMemoryRoomState } from './testing/in-memory-room-state';
export {
	createAccessRulesContainer,
	type AccessRulesContainerOptions,
} from './container';

export { toErrorResponse } from '@room-access/core';
