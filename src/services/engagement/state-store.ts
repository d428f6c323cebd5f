// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT STATE STORE — voice_history and imp_ask_question Documents
// ═══════════════════════════════════════════════════════════════════════════════

import {
  parseEngagementState,
  parseImportantEntries,
  type EngagementState,
  type ImportantQuestionEntry,
} from '../../core/engagement/index.js';
import { userPaths, type DocumentStore } from '../../storage/index.js';

export class EngagementStateStore {
  private readonly docs: DocumentStore;

  constructor(docs: DocumentStore) {
    this.docs = docs;
  }

  async load(userId: string): Promise<EngagementState> {
    return parseEngagementState(await this.docs.get(userPaths.voiceHistory(userId)));
  }

  /**
   * Replace the whole state in one write.
   */
  async save(userId: string, state: EngagementState): Promise<void> {
    await this.docs.set(userPaths.voiceHistory(userId), state);
  }

  async loadImportant(userId: string): Promise<ImportantQuestionEntry[]> {
    return parseImportantEntries(await this.docs.get(userPaths.importantQuestions(userId)));
  }

  async appendImportant(userId: string, entry: ImportantQuestionEntry): Promise<void> {
    const entries = await this.loadImportant(userId);
    entries.push(entry);
    await this.docs.set(userPaths.importantQuestions(userId), { entries });
  }
}
