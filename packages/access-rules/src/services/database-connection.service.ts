import { createLogger } from '@room-access/core';
import { type Db, MongoClient, type MongoClientOptions } from 'mongodb';

export class DatabaseConnectionService {
	private client: MongoClient | null = null;

	private db: Db | null = null;

	private connectionPromise: Promise<void> | null = null;

	private readonly logger = createLogger('DatabaseConnectionService');

	constructor(
		private readonly config: { uri: string; name: string; poolSize: number },
	) {}

	async getDb(): Promise<Db> {
		if (!this.db) {
			await this.connect();
		}

		if (!this.db) {
			throw new Error('Database connection not established');
		}

		return this.db;
	}

	private async connect(): Promise<void> {
		if (this.connectionPromise) {
			return this.connectionPromise;
		}

		this.connectionPromise = (async () => {
			const options: MongoClientOptions = {
				maxPoolSize: this.config.poolSize,
			};

			try {
				const client = new MongoClient(this.config.uri, options);
				await client.connect();

				this.client = client;
				this.db = client.db(this.config.name);
				this.logger.info(`Connected to MongoDB database: ${this.config.name}`);
			} catch (error: unknown) {
				this.logger.error({ msg: 'Failed to connect to MongoDB', err: error });
				this.connectionPromise = null;
				throw new Error('Database connection failed');
			}
		})();

		return this.connectionPromise;
	}

	async disconnect(): Promise<void> {
		if (this.client) {
			await this.client.close();
			this.client = null;
			this.db = null;
			this.connectionPromise = null;
			this.logger.info('Disconnected from MongoDB');
		}
	}
}
