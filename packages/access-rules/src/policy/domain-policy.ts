import { type AccessRule, AccessRules } from '../types';

// exact server name match, no wildcards or subdomains
export function isDomainAllowed(
	serverName: string,
	rule: AccessRule,
	denylist: ReadonlySet<string>,
): boolean {
	if (rule !== AccessRules.Restricted) {
		return true;
	}

	return !denylist.has(serverName);
}
