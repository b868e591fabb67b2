import 'reflect-metadata';

import type { Collection } from 'mongodb';
import { type DependencyContainer, container } from 'tsyringe';

import { RoomStateRepository, type RoomEventStore } from './repositories/room-state.repository';
import { AccessDecisionService } from './services/access-decision.service';
import { ConfigService } from './services/config.service';
import { DatabaseConnectionService } from './services/database-connection.service';
import { IdentityLookupService } from './services/identity-lookup.service';
import { RuleStoreService } from './services/rule-store.service';
import type { RoomStateReader } from './types';

export interface AccessRulesContainerOptions {
	// a host that already exposes resolved state skips the MongoDB adapter
	stateReader?: RoomStateReader;
	eventCollectionName?: string;
}

export async function createAccessRulesContainer(
	options: AccessRulesContainerOptions,
	configInstance: ConfigService,
	parent: DependencyContainer = container,
): Promise<DependencyContainer> {
	const child = parent.createChildContainer();

	child.register<ConfigService>(ConfigService, {
		useValue: configInstance,
	});

	if (options.stateReader) {
		child.register<RoomStateReader>('RoomStateReader', {
			useValue: options.stateReader,
		});
	} else {
		const databaseConfig = configInstance.getConfig('database');
		if (!databaseConfig) {
			throw new Error(
				'Database configuration is required when no state reader is supplied',
			);
		}

		const dbConnection = new DatabaseConnectionService(databaseConfig);
		const db = await dbConnection.getDb();

		child.register<DatabaseConnectionService>(DatabaseConnectionService, {
			useValue: dbConnection,
		});
		child.register<Collection<RoomEventStore>>('RoomEventCollection', {
			useValue: db.collection<RoomEventStore>(
				options.eventCollectionName ?? 'room_events',
			),
		});
		child.registerSingleton(RoomStateRepository);
		child.register<RoomStateReader>('RoomStateReader', {
			useToken: RoomStateRepository,
		});
	}

	child.registerSingleton(RuleStoreService);
	child.registerSingleton(IdentityLookupService);
	child.registerSingleton(AccessDecisionService);

	return child;
}
