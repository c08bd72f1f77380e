import type { ArtifactEntity, Entity, EntityKind, RelationshipEntity } from '../types';

/**
 * Primitives available inside one graph write transaction, bound to a campaign.
 * Throwing from the transaction callback rolls every write back.
 */
export interface GraphTransaction {
  /** Read-for-update: concurrent lockers of the same node or edge wait for this transaction */
  lockEntity(kind: EntityKind, id: string): Promise<Entity | null>;
  createArtifact(entity: ArtifactEntity): Promise<void>;
  /** Endpoints are matched by artifact name; throws ValidationError when either is missing */
  createRelationship(entity: RelationshipEntity): Promise<void>;
  /** Writes descriptive fields, provenance and updatedAt. Never moves relationship endpoints. */
  updateEntity(entity: Entity): Promise<void>;
}

export interface GraphStore {
  runTransaction<T>(campaignId: string, work: (tx: GraphTransaction) => Promise<T>): Promise<T>;
  getEntitiesByIds(campaignId: string, kind: EntityKind, ids: string[]): Promise<Entity[]>;
  ensureCampaignSchema(campaignId: string): Promise<void>;
}
