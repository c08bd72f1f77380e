/**
 * Naming of the per-campaign graph label and vector collection.
 */

import { createHash } from 'crypto';

export interface CampaignScope {
  campaignId: string;
  /** Neo4j label carried by every artifact node of the campaign */
  artifactLabel: string;
  /** Qdrant collection holding artifact, relation and note vectors */
  collection: string;
}

/**
 * Identifier-safe form of a campaign id. The hash suffix keeps ids that
 * sanitize alike ("camp-1", "camp_1") apart.
 */
export function campaignSlug(campaignId: string): string {
  const readable = campaignId.replace(/[^A-Za-z0-9]/g, '_');
  const digest = createHash('sha256').update(campaignId).digest('hex').substring(0, 8);
  return `${readable}_${digest}`;
}

export function campaignScope(campaignId: string): CampaignScope {
  const slug = campaignSlug(campaignId);
  return {
    campaignId,
    artifactLabel: `Campaign_${slug}_Artifact`,
    collection: `campaign_${slug}`,
  };
}

/**
 * Relationship labels become Neo4j relationship types, which cannot be parameterized.
 * "is ally of" -> "IS_ALLY_OF"
 */
export function sanitizeRelationshipType(label: string): string {
  const type = label
    .toUpperCase()
    .replace(/[^A-Z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
  return type.length > 0 ? type : 'RELATED_TO';
}
