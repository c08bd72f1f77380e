import { isNode, isRelationship, ManagedTransaction, Record as Neo4jRecord } from 'neo4j-driver';
import { z } from 'zod';
import type { Neo4jManager } from '@lorekeeper/database';
import { InvalidMergeTargetError, ValidationError } from '@lorekeeper/errors';
import type { ArtifactEntity, Entity, EntityKind, RelationshipEntity } from '../types';
import { logger } from '../utils/logger';
import { campaignScope, sanitizeRelationshipType } from './campaign-scope';
import type { GraphStore, GraphTransaction } from './graph-store';

const artifactPropertiesSchema = z.object({
  id: z.string(),
  campaign_id: z.string(),
  name: z.string(),
  type: z.string().default(''),
  description: z.string().default(''),
  note_ids: z.array(z.string()).default([]),
  created_at: z.string(),
  updated_at: z.string(),
});

const relationshipPropertiesSchema = z.object({
  id: z.string(),
  campaign_id: z.string(),
  label: z.string(),
  description: z.string().default(''),
  reasoning: z.string().default(''),
  note_ids: z.array(z.string()).default([]),
  created_at: z.string(),
  updated_at: z.string(),
});

export function decodeArtifact(record: Neo4jRecord, key = 'a'): ArtifactEntity | null {
  const value: unknown = record.get(key);
  if (!isNode(value)) {
    return null;
  }
  const parsed = artifactPropertiesSchema.safeParse(value.properties);
  if (!parsed.success) {
    logger.warn('Skipping artifact node with unexpected properties', { key, issues: parsed.error.issues.length });
    return null;
  }
  const p = parsed.data;
  return {
    kind: 'artifact',
    id: p.id,
    campaignId: p.campaign_id,
    name: p.name,
    type: p.type,
    description: p.description,
    noteIds: p.note_ids,
    createdAt: p.created_at,
    updatedAt: p.updated_at,
  };
}

export function decodeRelationship(record: Neo4jRecord): RelationshipEntity | null {
  const value: unknown = record.get('r');
  const sourceName: unknown = record.get('sourceName');
  const targetName: unknown = record.get('targetName');
  if (!isRelationship(value) || typeof sourceName !== 'string' || typeof targetName !== 'string') {
    return null;
  }
  const parsed = relationshipPropertiesSchema.safeParse(value.properties);
  if (!parsed.success) {
    logger.warn('Skipping relationship edge with unexpected properties', { issues: parsed.error.issues.length });
    return null;
  }
  const p = parsed.data;
  return {
    kind: 'relation',
    id: p.id,
    campaignId: p.campaign_id,
    sourceName,
    targetName,
    label: p.label,
    description: p.description,
    reasoning: p.reasoning,
    noteIds: p.note_ids,
    createdAt: p.created_at,
    updatedAt: p.updated_at,
  };
}

function decodeEntity(kind: EntityKind, record: Neo4jRecord): Entity | null {
  return kind === 'artifact' ? decodeArtifact(record) : decodeRelationship(record);
}

/**
 * Cypher for one campaign. Labels and relationship types cannot be parameters,
 * so they are derived from sanitized values only.
 */
class Neo4jGraphTransaction implements GraphTransaction {
  private readonly label: string;

  constructor(private readonly tx: ManagedTransaction, campaignId: string) {
    this.label = campaignScope(campaignId).artifactLabel;
  }

  async lockEntity(kind: EntityKind, id: string): Promise<Entity | null> {
    // Writing a property takes the entity's write lock for the rest of the transaction
    const cypher = kind === 'artifact'
      ? `MATCH (a:${this.label} {id: $id}) SET a._lock = true REMOVE a._lock RETURN a`
      : `MATCH (s:${this.label})-[r {id: $id}]->(t:${this.label})
         SET r._lock = true REMOVE r._lock
         RETURN r, s.name AS sourceName, t.name AS targetName`;
    const result = await this.tx.run(cypher, { id });
    const record = result.records[0];
    return record ? decodeEntity(kind, record) : null;
  }

  async createArtifact(entity: ArtifactEntity): Promise<void> {
    await this.tx.run(
      `CREATE (a:${this.label} {
         id: $id, campaign_id: $campaignId, name: $name, type: $type,
         description: $description, note_ids: $noteIds,
         created_at: $createdAt, updated_at: $updatedAt
       })`,
      {
        id: entity.id,
        campaignId: entity.campaignId,
        name: entity.name,
        type: entity.type,
        description: entity.description,
        noteIds: entity.noteIds,
        createdAt: entity.createdAt,
        updatedAt: entity.updatedAt,
      }
    );
  }

  async createRelationship(entity: RelationshipEntity): Promise<void> {
    const type = sanitizeRelationshipType(entity.label);
    const result = await this.tx.run(
      `MATCH (s:${this.label}) WHERE toLower(s.name) = toLower($sourceName)
       WITH s ORDER BY s.created_at LIMIT 1
       MATCH (t:${this.label}) WHERE toLower(t.name) = toLower($targetName)
       WITH s, t ORDER BY t.created_at LIMIT 1
       CREATE (s)-[r:${type} {
         id: $id, campaign_id: $campaignId, label: $label,
         description: $description, reasoning: $reasoning, note_ids: $noteIds,
         created_at: $createdAt, updated_at: $updatedAt
       }]->(t)
       RETURN r.id AS id`,
      {
        sourceName: entity.sourceName,
        targetName: entity.targetName,
        id: entity.id,
        campaignId: entity.campaignId,
        label: entity.label,
        description: entity.description,
        reasoning: entity.reasoning,
        noteIds: entity.noteIds,
        createdAt: entity.createdAt,
        updatedAt: entity.updatedAt,
      }
    );

    if (result.records.length === 0) {
      throw new ValidationError('Relationship endpoints not found in campaign graph', {
        sourceName: entity.sourceName,
        targetName: entity.targetName,
        label: entity.label,
      });
    }
  }

  async updateEntity(entity: Entity): Promise<void> {
    const result = entity.kind === 'artifact'
      ? await this.tx.run(
          `MATCH (a:${this.label} {id: $id})
           SET a.description = $description, a.note_ids = $noteIds, a.updated_at = $updatedAt
           RETURN a.id AS id`,
          { id: entity.id, description: entity.description, noteIds: entity.noteIds, updatedAt: entity.updatedAt }
        )
      : await this.tx.run(
          `MATCH (:${this.label})-[r {id: $id}]->(:${this.label})
           SET r.description = $description, r.reasoning = $reasoning,
               r.note_ids = $noteIds, r.updated_at = $updatedAt
           RETURN r.id AS id`,
          {
            id: entity.id,
            description: entity.description,
            reasoning: entity.reasoning,
            noteIds: entity.noteIds,
            updatedAt: entity.updatedAt,
          }
        );

    if (result.records.length === 0) {
      throw new InvalidMergeTargetError(entity.id, 'entity disappeared during update');
    }
  }
}

export class Neo4jGraphStore implements GraphStore {
  constructor(private readonly neo4j: Neo4jManager) {}

  runTransaction<T>(campaignId: string, work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    return this.neo4j.writeTransaction((tx) => work(new Neo4jGraphTransaction(tx, campaignId)));
  }

  async getEntitiesByIds(campaignId: string, kind: EntityKind, ids: string[]): Promise<Entity[]> {
    if (ids.length === 0) {
      return [];
    }

    const label = campaignScope(campaignId).artifactLabel;
    const cypher = kind === 'artifact'
      ? `MATCH (a:${label}) WHERE a.id IN $ids RETURN a`
      : `MATCH (s:${label})-[r]->(t:${label}) WHERE r.id IN $ids
         RETURN r, s.name AS sourceName, t.name AS targetName`;

    const records = await this.neo4j.readTransaction(async (tx) => (await tx.run(cypher, { ids })).records);

    const entities: Entity[] = [];
    for (const record of records) {
      const entity = decodeEntity(kind, record);
      if (entity) {
        entities.push(entity);
      }
    }
    return entities;
  }

  async ensureCampaignSchema(campaignId: string): Promise<void> {
    const label = campaignScope(campaignId).artifactLabel;
    await this.neo4j.createConstraint(label, 'id');
    await this.neo4j.createIndex(label, 'name');
  }
}
