/**
 * Bookmarked questions per user. In memory, bounded.
 */

import { ValidationRejected } from '../types/errors.js';
import type { SavedQuery } from '../types/models.js';
import { systemClock, type Clock } from '../types/utils.js';

export interface SaveQueryInput {
  userId: string;
  name: string;
  question: string;
  generatedSql: string;
}

export interface SavedQueryStats {
  totalSaved: number;
  mostUsed: SavedQuery[];
  recent: SavedQuery[];
}

export class SavedQueryStore {
  private readonly queries = new Map<string, SavedQuery>();
  private counter = 0;

  constructor(
    private readonly maxQueries: number = 500,
    private readonly clock: Clock = systemClock
  ) {}

  get size(): number {
    return this.queries.size;
  }

  save(input: SaveQueryInput): SavedQuery {
    if (this.queries.size >= this.maxQueries) {
      throw new ValidationRejected(`Max saved queries (${this.maxQueries}) reached`);
    }

    this.counter++;
    const saved: SavedQuery = {
      id: `sq_${input.userId}_${this.counter}`,
      userId: input.userId,
      name: input.name,
      question: input.question,
      generatedSql: input.generatedSql,
      createdAt: new Date(this.clock()),
      runCount: 0,
    };
    this.queries.set(saved.id, saved);
    return { ...saved };
  }

  get(id: string): SavedQuery | null {
    const saved = this.queries.get(id);
    return saved ? { ...saved } : null;
  }

  /**
   * A user's saved queries, newest first.
   */
  listForUser(userId: string, limit: number = 50): SavedQuery[] {
    return this.newestFirst(this.ownedBy(userId)).slice(0, Math.max(0, limit));
  }

  delete(id: string): boolean {
    return this.queries.delete(id);
  }

  /**
   * Case-insensitive match on name or question.
   */
  search(userId: string, keyword: string): SavedQuery[] {
    const needle = keyword.toLowerCase();
    return this.ownedBy(userId).filter(
      (saved) =>
        saved.name.toLowerCase().includes(needle) || saved.question.toLowerCase().includes(needle)
    );
  }

  recordRun(id: string): void {
    const saved = this.queries.get(id);
    if (saved) {
      saved.runCount++;
    }
  }

  statsForUser(userId: string): SavedQueryStats {
    const owned = this.ownedBy(userId);
    return {
      totalSaved: owned.length,
      mostUsed: [...owned].sort((a, b) => b.runCount - a.runCount).slice(0, 5),
      recent: this.newestFirst(owned).slice(0, 5),
    };
  }

  private ownedBy(userId: string): SavedQuery[] {
    return [...this.queries.values()]
      .filter((saved) => saved.userId === userId)
      .map((saved) => ({ ...saved }));
  }

  // Ties on createdAt fall back to save order
  private newestFirst(queries: SavedQuery[]): SavedQuery[] {
    return queries
      .map((saved, index) => ({ saved, index }))
      .sort((a, b) => b.saved.createdAt.getTime() - a.saved.createdAt.getTime() || b.index - a.index)
      .map(({ saved }) => saved);
  }
}
