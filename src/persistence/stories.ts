import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { SavedStory, StoryId, StorySnapshot } from '../models.js';
import { PersistenceError, safeJsonParse } from '../utils/errorhandler.js';
import type { StoryDatabase } from './db.js';

const storyRowSchema = z.object({
  story_id: z.string(),
  context: z.string(),
  story_start: z.string(),
  actions_json: z.string(),
  results_json: z.string(),
  seed: z.string(),
  created_at: z.number(),
  updated_at: z.number(),
});

const summaryRowSchema = z.object({
  story_id: z.string(),
  story_start: z.string(),
  updated_at: z.number(),
});

const textListSchema = z.array(z.string());

export interface StorySummary {
  story_id: StoryId;
  preview: string;
  updated_at: number;
}

export class StoryStore {
  constructor(private readonly db: StoryDatabase) {}

  /** Inserts a new story, or overwrites `storyId` when given. Returns the story id. */
  save(snapshot: StorySnapshot, storyId?: StoryId): StoryId {
    const id = storyId ?? `story_${nanoid(10)}`;
    const now = Date.now();
    try {
      this.db
        .prepare(
          `INSERT INTO stories (story_id, context, story_start, actions_json, results_json, seed, created_at, updated_at)
           VALUES (?,?,?,?,?,?,?,?)
           ON CONFLICT(story_id) DO UPDATE SET
             context=excluded.context,
             story_start=excluded.story_start,
             actions_json=excluded.actions_json,
             results_json=excluded.results_json,
             seed=excluded.seed,
             updated_at=excluded.updated_at`
        )
        .run(
          id,
          snapshot.context,
          snapshot.storyStart,
          JSON.stringify(snapshot.actions),
          JSON.stringify(snapshot.results),
          snapshot.seed,
          now,
          now
        );
    } catch (error) {
      throw new PersistenceError('Could not save the story', 'save', { storyId: id }, error);
    }
    return id;
  }

  load(storyId: StoryId): SavedStory | null {
    let row: unknown;
    try {
      row = this.db.prepare('SELECT * FROM stories WHERE story_id=?').get(storyId);
    } catch (error) {
      throw new PersistenceError('Could not load the story', 'load', { storyId }, error);
    }
    if (row === undefined) return null;

    const parsed = storyRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new PersistenceError('Stored story is malformed', 'load', { storyId });
    }

    const record = parsed.data;
    return {
      story_id: record.story_id,
      context: record.context,
      storyStart: record.story_start,
      actions: safeJsonParse(record.actions_json, textListSchema, []),
      results: safeJsonParse(record.results_json, textListSchema, []),
      seed: record.seed,
      created_at: record.created_at,
      updated_at: record.updated_at,
    };
  }

  list(limit = 10): StorySummary[] {
    const rows = this.db
      .prepare('SELECT story_id, story_start, updated_at FROM stories ORDER BY updated_at DESC, story_id LIMIT ?')
      .all(limit);
    return z
      .array(summaryRowSchema)
      .parse(rows)
      .map((row) => ({
        story_id: row.story_id,
        preview: row.story_start.replace(/\s+/g, ' ').trim().slice(0, 60),
        updated_at: row.updated_at,
      }));
  }
}
