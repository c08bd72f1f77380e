/**
 * Entity model shared by the graph store, the vector index and the dedup pipeline.
 */

export type EntityKind = 'artifact' | 'relation';

/** Kinds that may appear in a campaign's vector collection */
export type IndexedKind = EntityKind | 'note';

export interface ArtifactDraft {
  kind: 'artifact';
  id: string;
  campaignId: string;
  name: string;
  /** character, location, item, event, ... */
  type: string;
  description: string;
  noteIds: string[];
}

export interface RelationshipDraft {
  kind: 'relation';
  id: string;
  campaignId: string;
  sourceName: string;
  targetName: string;
  label: string;
  description: string;
  reasoning: string;
  noteIds: string[];
}

/** An extracted entity that has not been persisted yet */
export type EntityDraft = ArtifactDraft | RelationshipDraft;

export interface EntityTimestamps {
  createdAt: string;
  updatedAt: string;
}

export type ArtifactEntity = ArtifactDraft & EntityTimestamps;
export type RelationshipEntity = RelationshipDraft & EntityTimestamps;
export type Entity = ArtifactEntity | RelationshipEntity;

export type EntityOfKind<K extends EntityKind> = Extract<Entity, { kind: K }>;
