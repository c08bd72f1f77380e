import {
  DependencyUnavailableError,
  MergeFailedError,
  ProviderError,
  SessionExpiredError,
  SessionNotFoundError,
  ValidationError,
} from '@lorekeeper/errors';
import { verdictJson } from '../helpers/fakes';
import {
  artifactDraft,
  artifactEntity,
  CAMPAIGN_ID,
  COLLECTION,
  Harness,
  pendingToken,
  relationshipDraft,
  relationshipEntity,
  START_MS,
} from '../helpers/harness';

const GANDALF_QUERY = 'Artifact: Gandalf |';
const GREY_QUERY = 'Artifact: Gandalf the Grey |';

describe('DeduplicationCoordinator', () => {
  let h: Harness;

  beforeEach(() => {
    h = new Harness();
  });

  describe('Gandalf scenarios', () => {
    test('should auto-merge "Gandalf the Grey" into Gandalf and keep the stored name', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard', noteIds: ['note-1'] }));
      h.setSimilarity(GREY_QUERY, existing.id, 0.94);
      h.llm.reply(verdictJson('duplicate', 1, 98, 'Same wizard'));
      h.advance(1000);

      const outcome = await h.coordinator.processEntity(
        artifactDraft({ name: 'Gandalf the Grey', description: 'leader of the Fellowship', noteIds: ['note-2'] }),
        CAMPAIGN_ID
      );

      expect(outcome).toEqual({ status: 'merged', entityId: existing.id, displayKey: 'Gandalf' });
      expect(h.graph.artifactsIn(CAMPAIGN_ID)).toHaveLength(1);

      const stored = h.graph.artifacts.get(existing.id);
      expect(stored?.name).toBe('Gandalf');
      expect(stored?.description).toBe('A wizard | leader of the Fellowship');
      expect(stored?.noteIds).toEqual(['note-1', 'note-2']);
      expect(stored?.updatedAt).toBe(new Date(START_MS + 1000).toISOString());
      expect(stored?.createdAt).toBe(existing.createdAt);
    });

    test('should re-embed the merged text', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard' }));
      h.setSimilarity(GREY_QUERY, existing.id, 0.94);
      h.llm.reply(verdictJson('duplicate', 1, 98));

      await h.coordinator.processEntity(
        artifactDraft({ name: 'Gandalf the Grey', description: 'leader of the Fellowship', noteIds: ['note-2'] }),
        CAMPAIGN_ID
      );

      const mergedText = 'Artifact: Gandalf | Type: character | Description: A wizard | leader of the Fellowship';
      const point = h.vectors.point(COLLECTION, existing.id);
      expect(point?.payload.text).toBe(mergedText);
      expect(point?.vector).toEqual(h.embeddings.vectorFor(mergedText));
      expect(h.embeddings.calls[h.embeddings.calls.length - 1]).toBe(mergedText);
    });

    test('should hold a 0.75 match for confirmation and create "Gandalf the Grey" on create_new', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard' }));
      h.setSimilarity(GREY_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('duplicate', 1, 80, 'Possibly the same wizard'));
      const draft = artifactDraft({ name: 'Gandalf the Grey', description: 'A grey pilgrim', noteIds: ['note-2'] });

      const token = pendingToken(await h.coordinator.processEntity(draft, CAMPAIGN_ID));

      const pending = h.coordinator.getPendingDecision(token);
      expect(pending.candidateEntityIds).toEqual([existing.id]);
      expect(pending.candidates).toEqual([{ entityId: existing.id, displayKey: 'Gandalf', score: 0.75 }]);
      expect(pending.reasoning).toBe('Possibly the same wizard');
      expect(pending.expiresAt).toBe(new Date(START_MS + 600000).toISOString());
      expect(h.graph.artifactsIn(CAMPAIGN_ID)).toHaveLength(1);

      const resolved = await h.coordinator.resolveAmbiguous(token, { action: 'create_new' });

      expect(resolved).toEqual({ status: 'created', entityId: draft.id, displayKey: 'Gandalf the Grey' });
      expect(h.graph.artifactsIn(CAMPAIGN_ID).map((artifact) => artifact.name).sort()).toEqual([
        'Gandalf',
        'Gandalf the Grey',
      ]);
      expect(h.graph.artifacts.get(existing.id)?.description).toBe('A wizard');
      expect(h.vectors.point(COLLECTION, draft.id)?.payload.text).toBe(
        'Artifact: Gandalf the Grey | Type: character | Description: A grey pilgrim'
      );
      expect(h.sessions.size).toBe(0);
      expect(() => h.coordinator.getPendingDecision(token)).toThrow(SessionNotFoundError);
    });

    test('should not create a second node when the same entity is submitted twice', async () => {
      h.matchIdenticalVectors = true;
      h.llm.reply(verdictJson('duplicate', 1, 99, 'Identical entry'));
      const first = artifactDraft({ noteIds: ['note-1'] });

      expect(await h.coordinator.processEntity(first, CAMPAIGN_ID)).toEqual({
        status: 'created',
        entityId: first.id,
        displayKey: 'Gandalf',
      });
      const second = await h.coordinator.processEntity(artifactDraft({ noteIds: ['note-2'] }), CAMPAIGN_ID);

      expect(second).toEqual({ status: 'merged', entityId: first.id, displayKey: 'Gandalf' });
      expect(h.graph.artifactsIn(CAMPAIGN_ID)).toHaveLength(1);
      expect(h.graph.artifacts.get(first.id)?.description).toBe('A wizard');
      expect(h.graph.artifacts.get(first.id)?.noteIds).toEqual(['note-1', 'note-2']);
    });

    test('should merge into the chosen candidate when the user confirms', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard' }));
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('duplicate', 1, 80));
      const draft = artifactDraft({ description: 'A grey pilgrim', noteIds: ['note-2'] });
      const token = pendingToken(await h.coordinator.processEntity(draft, CAMPAIGN_ID));

      const resolved = await h.coordinator.resolveAmbiguous(token, { action: 'merge', targetId: existing.id });

      expect(resolved).toEqual({ status: 'merged', entityId: existing.id, displayKey: 'Gandalf' });
      expect(h.graph.artifacts.get(existing.id)?.description).toBe('A wizard | A grey pilgrim');
      expect(h.graph.artifacts.get(existing.id)?.noteIds).toEqual(['note-1', 'note-2']);
      expect(h.graph.artifacts.has(draft.id)).toBe(false);
    });
  });

  describe('create path', () => {
    test('should create without asking the LLM when the campaign has no similar entity', async () => {
      const draft = artifactDraft();

      const outcome = await h.coordinator.processEntity(draft, CAMPAIGN_ID);

      expect(outcome).toEqual({ status: 'created', entityId: draft.id, displayKey: 'Gandalf' });
      expect(h.llm.calls).toHaveLength(0);
      expect(h.graph.artifacts.get(draft.id)?.createdAt).toBe(new Date(START_MS).toISOString());
    });

    test('should reuse the search embedding for the created entity', async () => {
      const draft = artifactDraft();

      await h.coordinator.processEntity(draft, CAMPAIGN_ID);

      expect(h.embeddings.calls).toEqual(['Artifact: Gandalf | Type: character | Description: A wizard']);
      expect(h.vectors.point(COLLECTION, draft.id)?.payload).toEqual({
        kind: 'artifact',
        campaign_id: CAMPAIGN_ID,
        entity_id: draft.id,
        display_key: 'Gandalf',
        text: 'Artifact: Gandalf | Type: character | Description: A wizard',
      });
    });

    test('should create when the LLM says the candidate is unrelated', async () => {
      const existing = await h.seed(artifactEntity({ name: 'Gandalf', description: 'A wizard' }));
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.8);
      h.llm.reply(verdictJson('unrelated', null, 90));
      const draft = artifactDraft({ description: 'A horse of Rohan' });

      const outcome = await h.coordinator.processEntity(draft, CAMPAIGN_ID);

      expect(outcome.status).toBe('created');
      expect(h.llm.calls).toHaveLength(1);
      expect(h.graph.artifacts.get(existing.id)?.description).toBe('A wizard');
    });

    test('should surface missing relationship endpoints as a validation error', async () => {
      await expect(h.coordinator.processEntity(relationshipDraft(), CAMPAIGN_ID)).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(h.graph.relationshipsIn(CAMPAIGN_ID)).toHaveLength(0);
    });
  });

  describe('fallback under outage', () => {
    test('should create as new when embeddings are unavailable', async () => {
      h.embeddings.failure = new Error('embedding service down');
      const draft = artifactDraft();

      const outcome = await h.coordinator.processEntity(draft, CAMPAIGN_ID);

      expect(outcome).toEqual({ status: 'created', entityId: draft.id, displayKey: 'Gandalf' });
      expect(h.graph.artifacts.has(draft.id)).toBe(true);
      expect(h.vectors.point(COLLECTION, draft.id)).toBeUndefined();
      expect(h.llm.calls).toHaveLength(0);
    });

    test('should create as new and still index when vector search fails', async () => {
      h.vectors.searchFailure = new Error('qdrant unreachable');
      const draft = artifactDraft();

      const outcome = await h.coordinator.processEntity(draft, CAMPAIGN_ID);

      expect(outcome.status).toBe('created');
      expect(h.vectors.point(COLLECTION, draft.id)?.vector).toEqual(
        h.embeddings.vectorFor('Artifact: Gandalf | Type: character | Description: A wizard')
      );
    });

    test('should create as new when graph lookup of candidates fails', async () => {
      const existing = await h.seed(artifactEntity());
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.95);
      h.graph.readFailure = new Error('neo4j unavailable');

      const outcome = await h.coordinator.processEntity(artifactDraft({ description: 'Grey' }), CAMPAIGN_ID);

      expect(outcome.status).toBe('created');
      expect(h.graph.artifactsIn(CAMPAIGN_ID)).toHaveLength(2);
    });

    test('should never merge when the LLM fails', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard' }));
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.99);
      h.llm.reply(new ProviderError('openai', 'chat completion failed'));

      const outcome = await h.coordinator.processEntity(artifactDraft({ description: 'Grey' }), CAMPAIGN_ID);

      expect(outcome.status).toBe('created');
      expect(h.graph.artifacts.get(existing.id)?.description).toBe('A wizard');
    });

    test('should create as new when the LLM answer cannot be decoded', async () => {
      const existing = await h.seed(artifactEntity());
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.99);
      h.llm.reply('The answer is yes');

      const outcome = await h.coordinator.processEntity(artifactDraft({ description: 'Grey' }), CAMPAIGN_ID);

      expect(outcome.status).toBe('created');
    });

    test('should create as new when detection exceeds its timeouts', async () => {
      const slow = new Harness({ timeouts: { embeddingMs: 20, pipelineMs: 50 } });
      slow.embeddings.hang = true;
      const draft = artifactDraft();

      const outcome = await slow.coordinator.processEntity(draft, CAMPAIGN_ID);

      expect(outcome).toEqual({ status: 'created', entityId: draft.id, displayKey: 'Gandalf' });
      expect(slow.vectors.point(COLLECTION, draft.id)).toBeUndefined();
    });
  });

  describe('session single-flight', () => {
    test('should return the existing token for repeated content without another LLM call', async () => {
      const existing = await h.seed(artifactEntity());
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('related', null, 70));

      const first = pendingToken(
        await h.coordinator.processEntity(artifactDraft({ description: 'A grey pilgrim', noteIds: ['note-2'] }), CAMPAIGN_ID)
      );
      const second = pendingToken(
        await h.coordinator.processEntity(
          artifactDraft({ name: '  gandalf ', description: 'A  GREY   pilgrim', noteIds: ['note-3'] }),
          CAMPAIGN_ID
        )
      );

      expect(second).toBe(first);
      expect(h.llm.calls).toHaveLength(1);
      expect(h.sessions.size).toBe(1);
      expect(h.coordinator.getPendingDecision(first).newEntity.noteIds).toEqual(['note-2', 'note-3']);
    });

    test('should join concurrent registrations of the same content', async () => {
      const existing = await h.seed(artifactEntity());
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('related', null, 70), verdictJson('related', null, 70));

      const [a, b] = await Promise.all([
        h.coordinator.processEntity(artifactDraft({ description: 'A grey pilgrim', noteIds: ['note-2'] }), CAMPAIGN_ID),
        h.coordinator.processEntity(artifactDraft({ description: 'A grey pilgrim', noteIds: ['note-3'] }), CAMPAIGN_ID),
      ]);

      expect(pendingToken(a)).toBe(pendingToken(b));
      expect(h.sessions.size).toBe(1);
      const noteIds = [...h.coordinator.getPendingDecision(pendingToken(a)).newEntity.noteIds].sort();
      expect(noteIds).toEqual(['note-2', 'note-3']);
    });
  });

  describe('merge procedure', () => {
    test('should be a no-op on content when the same draft is merged again', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard', noteIds: ['note-1'] }));
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.97);
      h.llm.reply(verdictJson('duplicate', 1, 99));

      const outcome = await h.coordinator.processEntity(
        artifactDraft({ description: 'A wizard', noteIds: ['note-1'] }),
        CAMPAIGN_ID
      );

      expect(outcome.status).toBe('merged');
      expect(h.graph.artifacts.get(existing.id)?.description).toBe('A wizard');
      expect(h.graph.artifacts.get(existing.id)?.noteIds).toEqual(['note-1']);
    });

    test('should keep relationship endpoints and merge reasoning', async () => {
      const existing = await h.seed(relationshipEntity({ description: 'Guides the hobbit', reasoning: '' }));
      h.setSimilarity('Relationship: Gandalf -[mentors]-> Frodo', existing.id, 0.93);
      h.llm.reply(verdictJson('duplicate', 1, 97));

      const outcome = await h.coordinator.processEntity(
        relationshipDraft({ description: 'Teaches him lore', reasoning: 'Seen in session 3', noteIds: ['note-2'] }),
        CAMPAIGN_ID
      );

      expect(outcome).toEqual({ status: 'merged', entityId: existing.id, displayKey: 'Gandalf -[mentors]-> Frodo' });
      expect(h.graph.relationships.get(existing.id)).toMatchObject({
        sourceName: 'Gandalf',
        targetName: 'Frodo',
        label: 'mentors',
        description: 'Guides the hobbit | Teaches him lore',
        reasoning: 'Seen in session 3',
        noteIds: ['note-1', 'note-2'],
      });
    });

    test('should retry a failed merge once with a fresh transaction', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard' }));
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.95);
      h.llm.reply(verdictJson('duplicate', 1, 98));
      h.graph.updateFailures = [new Error('transient deadlock')];

      const outcome = await h.coordinator.processEntity(
        artifactDraft({ description: 'leader of the Fellowship', noteIds: ['note-2'] }),
        CAMPAIGN_ID
      );

      expect(outcome.status).toBe('merged');
      expect(h.graph.rollbacks).toBe(1);
      expect(h.graph.artifacts.get(existing.id)?.description).toBe('A wizard | leader of the Fellowship');
    });

    test('should roll back the graph and fail when the vector write keeps failing', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard' }));
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.95);
      h.llm.reply(verdictJson('duplicate', 1, 98));
      h.vectors.upsertFailures = [new Error('qdrant down'), new Error('qdrant down')];

      await expect(
        h.coordinator.processEntity(artifactDraft({ description: 'leader of the Fellowship' }), CAMPAIGN_ID)
      ).rejects.toBeInstanceOf(MergeFailedError);

      expect(h.graph.rollbacks).toBe(2);
      expect(h.graph.artifacts.get(existing.id)?.description).toBe('A wizard');
      expect(h.vectors.point(COLLECTION, existing.id)?.payload.text).toBe(
        'Artifact: Gandalf | Type: character | Description: A wizard'
      );
    });

    test('should create as new when the merge target disappeared', async () => {
      const existing = await h.seed(artifactEntity());
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('duplicate', 1, 80));
      const draft = artifactDraft({ description: 'A grey pilgrim', noteIds: ['note-2'] });
      const token = pendingToken(await h.coordinator.processEntity(draft, CAMPAIGN_ID));
      h.graph.remove(existing.id);

      const outcome = await h.coordinator.resolveAmbiguous(token, { action: 'merge', targetId: existing.id });

      expect(outcome).toEqual({ status: 'created', entityId: draft.id, displayKey: 'Gandalf' });
      expect(h.graph.artifacts.get(draft.id)?.noteIds).toEqual(['note-2']);
    });
  });

  describe('validation and sessions', () => {
    test('should reject a draft from another campaign', async () => {
      await expect(
        h.coordinator.processEntity(artifactDraft({ campaignId: 'campaign-2' }), CAMPAIGN_ID)
      ).rejects.toBeInstanceOf(ValidationError);
    });

    test('should reject a draft with a blank name', async () => {
      await expect(h.coordinator.processEntity(artifactDraft({ name: '   ' }), CAMPAIGN_ID)).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(h.embeddings.calls).toHaveLength(0);
    });

    test('should keep the session pending when the merge target is not a candidate', async () => {
      const existing = await h.seed(artifactEntity());
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('related', null, 70));
      const token = pendingToken(
        await h.coordinator.processEntity(artifactDraft({ description: 'Grey' }), CAMPAIGN_ID)
      );

      await expect(
        h.coordinator.resolveAmbiguous(token, { action: 'merge', targetId: 'some-other-id' })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(h.sessions.size).toBe(1);
    });

    test('should report an expired session', async () => {
      const existing = await h.seed(artifactEntity());
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('related', null, 70));
      const token = pendingToken(
        await h.coordinator.processEntity(artifactDraft({ description: 'Grey' }), CAMPAIGN_ID)
      );

      h.advance(600000);

      expect(() => h.coordinator.getPendingDecision(token)).toThrow(SessionExpiredError);
      await expect(h.coordinator.resolveAmbiguous(token, { action: 'create_new' })).rejects.toBeInstanceOf(
        SessionExpiredError
      );
    });
  });

  describe('resolution failure', () => {
    async function pendingGrey(): Promise<{ token: string; existingId: string; draftId: string }> {
      const existing = await h.seed(artifactEntity({ description: 'A wizard' }));
      h.setSimilarity(GREY_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('duplicate', 1, 80));
      const draft = artifactDraft({ name: 'Gandalf the Grey', description: 'A grey pilgrim', noteIds: ['note-2'] });
      const token = pendingToken(await h.coordinator.processEntity(draft, CAMPAIGN_ID));
      return { token, existingId: existing.id, draftId: draft.id };
    }

    test('should keep the session pending when create_new cannot reach the graph', async () => {
      const { token, draftId } = await pendingGrey();
      h.graph.transactionFailures = [new Error('neo4j unavailable')];

      await expect(h.coordinator.resolveAmbiguous(token, { action: 'create_new' })).rejects.toBeInstanceOf(
        DependencyUnavailableError
      );

      expect(h.graph.artifacts.has(draftId)).toBe(false);
      expect(h.sessions.size).toBe(1);
      const pending = h.coordinator.getPendingDecision(token);
      expect(pending.newEntity.id).toBe(draftId);
      expect(pending.expiresAt).toBe(new Date(START_MS + 600000).toISOString());

      const retried = await h.coordinator.resolveAmbiguous(token, { action: 'create_new' });

      expect(retried).toEqual({ status: 'created', entityId: draftId, displayKey: 'Gandalf the Grey' });
      expect(h.sessions.size).toBe(0);
    });

    test('should keep the session pending when the chosen merge fails', async () => {
      const { token, existingId } = await pendingGrey();
      h.graph.updateFailures = [new Error('deadlock'), new Error('deadlock')];

      await expect(
        h.coordinator.resolveAmbiguous(token, { action: 'merge', targetId: existingId })
      ).rejects.toBeInstanceOf(MergeFailedError);

      expect(h.graph.artifacts.get(existingId)?.description).toBe('A wizard');
      expect(h.coordinator.getPendingDecision(token).candidateEntityIds).toEqual([existingId]);

      const retried = await h.coordinator.resolveAmbiguous(token, { action: 'merge', targetId: existingId });

      expect(retried).toEqual({ status: 'merged', entityId: existingId, displayKey: 'Gandalf' });
      expect(h.graph.artifacts.get(existingId)?.description).toBe('A wizard | A grey pilgrim');
    });
  });

  describe('metrics', () => {
    test('should report tokens and phase durations for an adjudicated entity', async () => {
      const existing = await h.seed(artifactEntity({ description: 'A wizard' }));
      h.setSimilarity(GANDALF_QUERY, existing.id, 0.75);
      h.llm.reply(verdictJson('related', null, 70));
      const embed = h.embeddings.embed.bind(h.embeddings);
      jest.spyOn(h.embeddings, 'embed').mockImplementation(async (text: string) => {
        h.advance(40);
        return embed(text);
      });
      const generate = h.llm.generateWithRetry.bind(h.llm);
      jest.spyOn(h.llm, 'generateWithRetry').mockImplementation(
        async (model: string, systemPrompt: string, userPrompt: string, maxRetries: number) => {
          h.advance(250);
          return generate(model, systemPrompt, userPrompt, maxRetries);
        }
      );

      const { outcome, metrics } = await h.coordinator.processEntityWithMetrics(
        artifactDraft({ description: 'A grey pilgrim' }),
        CAMPAIGN_ID
      );

      expect(outcome.status).toBe('pending_confirmation');
      expect(metrics).toEqual({ candidateSearchMs: 40, adjudicationMs: 250, totalMs: 290, tokensUsed: 30 });
    });

    test('should report no tokens when the LLM is not consulted', async () => {
      const { outcome, metrics } = await h.coordinator.processEntityWithMetrics(artifactDraft(), CAMPAIGN_ID);

      expect(outcome.status).toBe('created');
      expect(metrics).toEqual({ candidateSearchMs: 0, adjudicationMs: 0, totalMs: 0, tokensUsed: 0 });
    });
  });
});
