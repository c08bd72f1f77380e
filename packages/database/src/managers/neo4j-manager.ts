/**
 * Neo4j Manager
 * Handles Neo4j driver initialization and session management
 */

import neo4j, { Driver, ManagedTransaction, Session, auth, Config } from 'neo4j-driver';
import { createRetry } from '@lorekeeper/resilience';
import { logger } from '../logger';
import type { Neo4jConfig } from '../types';

export class Neo4jManager {
  private driver: Driver | null = null;
  private config: Neo4jConfig;
  private retry = createRetry({
    maxRetries: 3,
    initialDelay: 1000,
    backoffStrategy: 'exponential',
  });

  constructor(config: Neo4jConfig) {
    this.config = config;
  }

  /**
   * Initialize Neo4j driver
   */
  async initialize(): Promise<void> {
    try {
      const driverConfig: Config = {
        maxConnectionPoolSize: this.config.maxConnectionPoolSize || 100,
        connectionAcquisitionTimeout: this.config.connectionAcquisitionTimeout || 60000,
        connectionTimeout: this.config.connectionTimeout || 30000,
        maxTransactionRetryTime: this.config.maxTransactionRetryTime || 30000,
        encrypted: this.config.encrypted ?? false,
      };

      const driver = neo4j.driver(
        this.config.uri,
        auth.basic(this.config.username, this.config.password),
        driverConfig
      );
      this.driver = driver;

      await this.retry.execute(() => driver.verifyConnectivity());

      logger.info('Neo4j connected successfully', {
        uri: this.config.uri,
        database: this.config.database,
      });
    } catch (error) {
      logger.error('Neo4j initialization failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
        uri: this.config.uri,
      });
      throw error;
    }
  }

  /**
   * Get a Neo4j session
   */
  getSession(database?: string): Session {
    if (!this.driver) {
      throw new Error('Neo4j driver not initialized');
    }

    const target = database || this.config.database;
    return this.driver.session(target ? { database: target } : {});
  }

  /**
   * Execute a single auto-commit Cypher query
   */
  async query(
    cypher: string,
    parameters?: Record<string, unknown>,
    database?: string
  ): Promise<Array<Record<string, unknown>>> {
    const session = this.getSession(database);

    try {
      const result = await session.run(cypher, parameters);
      return result.records.map((record) => record.toObject());
    } catch (error) {
      logger.error('Neo4j query error', {
        error: error instanceof Error ? error.message : 'Unknown error',
        query: cypher.substring(0, 100),
      });
      throw error;
    } finally {
      await session.close();
    }
  }

  /**
   * Execute a read transaction
   */
  async readTransaction<T>(
    work: (tx: ManagedTransaction) => Promise<T>,
    database?: string
  ): Promise<T> {
    const session = this.getSession(database);

    try {
      return await session.executeRead(work);
    } catch (error) {
      logger.error('Neo4j read transaction error', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      await session.close();
    }
  }

  /**
   * Execute a write transaction. Rolled back if `work` throws.
   */
  async writeTransaction<T>(
    work: (tx: ManagedTransaction) => Promise<T>,
    database?: string
  ): Promise<T> {
    const session = this.getSession(database);

    try {
      return await session.executeWrite(work);
    } catch (error) {
      logger.error('Neo4j write transaction error', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      await session.close();
    }
  }

  /**
   * Create unique constraint on a node property
   */
  async createConstraint(label: string, property: string, database?: string): Promise<void> {
    const constraintName = `constraint_${label}_${property}`.toLowerCase();
    const cypher = `CREATE CONSTRAINT ${constraintName} IF NOT EXISTS FOR (n:${label}) REQUIRE n.${property} IS UNIQUE`;

    await this.query(cypher, {}, database);
    logger.debug('Neo4j constraint created', { label, property });
  }

  /**
   * Create index on a node property
   */
  async createIndex(label: string, property: string, database?: string): Promise<void> {
    const indexName = `idx_${label}_${property}`.toLowerCase();
    const cypher = `CREATE INDEX ${indexName} IF NOT EXISTS FOR (n:${label}) ON (n.${property})`;

    await this.query(cypher, {}, database);
    logger.debug('Neo4j index created', { label, property });
  }

  /**
   * Close the driver
   */
  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
      logger.info('Neo4j driver closed');
    }
  }
}
