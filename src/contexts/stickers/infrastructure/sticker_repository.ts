/**
 * Sticker Repository
 *
 * Infrastructure layer for persisting stickers, their tags, per-IP votes
 * and operation logs. Writes that touch several keys are committed as a
 * single atomic operation guarded by versionstamp checks.
 *
 * Key layout:
 * - ['stickers', id] -> sticker record
 * - ['stickers_by_md5', md5] -> sticker id
 * - ['tags', name] -> tag record
 * - ['user_actions', stickerId, ip] -> { action, createdAt }
 * - ['operation_logs', stickerId, id] -> operation log record
 */

import {
  KVConflictError,
  query,
  readRecord,
  type AtomicOperation,
  type KVStore,
  type KvKey,
  type Query,
} from '../../../../framework/orm/mod.ts';
import { Sticker, VOTE_ACTIONS, type VoteAction } from '../domain/sticker.ts';
import { Tag } from '../domain/tag.ts';
import { OperationLog } from '../domain/operation_log.ts';

const MD5_INDEX = 'stickers_by_md5';
const USER_ACTIONS = 'user_actions';

export interface VoteEntry {
  action: VoteAction | null;
  versionstamp: string | null;
}

function md5Key(md5: string): KvKey {
  return [MD5_INDEX, md5];
}

function voteKey(stickerId: string, ip: string): KvKey {
  return [USER_ACTIONS, stickerId, ip];
}

function parseVote(value: unknown): VoteAction | null {
  if (value === null) return null;
  const action = readRecord(value).get('action');
  return VOTE_ACTIONS.find((candidate) => candidate === action) ?? null;
}

function stageLog(op: AtomicOperation, log: OperationLog): void {
  log.touch();
  op.check({ key: log.key, versionstamp: null }).set(log.key, log.toRecord());
}

/**
 * Repository for sticker aggregates
 */
export class StickerRepository {
  constructor(private store: KVStore) {}

  /**
   * Find sticker by ID
   */
  findById(id: string): Promise<Sticker | null> {
    return Sticker.findById(id, this.store);
  }

  /**
   * Find sticker by the md5 of its image
   */
  async findByMd5(md5: string): Promise<Sticker | null> {
    const id = await this.store.get<unknown>(md5Key(md5));
    return typeof id === 'string' ? await this.findById(id) : null;
  }

  /**
   * Find the stickers among the given ids, in request order
   */
  async findByIds(ids: string[]): Promise<Sticker[]> {
    const found = await Promise.all([...new Set(ids)].map((id) => this.findById(id)));
    return found.filter((sticker): sticker is Sticker => sticker !== null);
  }

  /**
   * All stickers
   */
  all(): Promise<Sticker[]> {
    return Sticker.findAll(this.store);
  }

  /**
   * Query builder over stickers
   */
  query(): Query<Sticker> {
    return query(Sticker, this.store);
  }

  /**
   * Store a new sticker and link its tags; false when the md5 is taken.
   * The log, when given, is written in the same commit.
   */
  async insert(sticker: Sticker, log?: OperationLog): Promise<boolean> {
    sticker.assertValid();
    log?.assertValid();

    const op = this.store
      .atomic()
      .check({ key: md5Key(sticker.md5), versionstamp: null })
      .check({ key: sticker.key, versionstamp: null })
      .set(sticker.key, sticker.toRecord())
      .set(md5Key(sticker.md5), sticker.id);
    await this.stageTagChanges(op, [], sticker.tags);
    if (log) stageLog(op, log);

    if (await this.store.commit(op)) return true;
    if ((await this.store.get<unknown>(md5Key(sticker.md5))) !== null) return false;
    throw new KVConflictError();
  }

  /**
   * Save changes to a sticker read earlier, re-linking tags that changed.
   * The log, when given, is written in the same commit.
   */
  async update(sticker: Sticker, previousTags: string[], log?: OperationLog): Promise<void> {
    sticker.assertValid();
    log?.assertValid();
    sticker.touch();

    const op = this.store
      .atomic()
      .check({ key: sticker.key, versionstamp: sticker.versionstamp })
      .set(sticker.key, sticker.toRecord());
    await this.stageTagChanges(op, previousTags, sticker.tags);
    if (log) stageLog(op, log);

    await this.store.commitOrThrow(op);
  }

  /**
   * Remove a sticker, unlink its tags and drop its votes
   */
  async remove(sticker: Sticker): Promise<void> {
    const votes = await this.store.list<unknown>([USER_ACTIONS, sticker.id]);

    const op = this.store
      .atomic()
      .check({ key: sticker.key, versionstamp: sticker.versionstamp })
      .delete(sticker.key)
      .delete(md5Key(sticker.md5));
    for (const vote of votes) {
      op.check({ key: vote.key, versionstamp: vote.versionstamp }).delete(vote.key);
    }
    await this.stageTagChanges(op, sticker.tags, []);

    await this.store.commitOrThrow(op);
  }

  // ============================================================================
  // Votes
  // ============================================================================

  /**
   * The vote an IP currently holds on a sticker
   */
  async getVote(stickerId: string, ip: string): Promise<VoteEntry> {
    const entry = await this.store.getEntry<unknown>(voteKey(stickerId, ip));
    return { action: parseVote(entry.value), versionstamp: entry.versionstamp };
  }

  /**
   * Save the sticker's new counts together with the voter's new vote
   */
  async saveVote(sticker: Sticker, ip: string, previous: VoteEntry, next: VoteAction | null): Promise<void> {
    sticker.assertValid();
    sticker.touch();

    const key = voteKey(sticker.id, ip);
    const op = this.store
      .atomic()
      .check({ key: sticker.key, versionstamp: sticker.versionstamp })
      .check({ key, versionstamp: previous.versionstamp })
      .set(sticker.key, sticker.toRecord());

    if (next) {
      op.set(key, { action: next, createdAt: new Date().toISOString() });
    } else {
      op.delete(key);
    }

    await this.store.commitOrThrow(op);
  }

  /**
   * Votes of one IP across several stickers
   */
  async votesFor(stickerIds: string[], ip: string): Promise<Map<string, VoteAction>> {
    const values = await this.store.getMany<unknown>(stickerIds.map((id) => voteKey(id, ip)));
    const votes = new Map<string, VoteAction>();

    stickerIds.forEach((id, index) => {
      const action = parseVote(values[index] ?? null);
      if (action) votes.set(id, action);
    });

    return votes;
  }

  // ============================================================================
  // Tags
  // ============================================================================

  /**
   * Find a tag by name
   */
  findTag(name: string): Promise<Tag | null> {
    return Tag.findById(name, this.store);
  }

  /**
   * Most used tags, ties broken by name
   */
  popularTags(limit: number): Promise<Tag[]> {
    return query(Tag, this.store)
      .orderBy((tag) => tag.usageCount, 'desc')
      .orderBy((tag) => tag.name)
      .limit(limit)
      .all();
  }

  /**
   * Adjust usage counts for tags unlinked from and linked to a sticker
   */
  private async stageTagChanges(op: AtomicOperation, before: string[], after: string[]): Promise<void> {
    const deltas = new Map<string, number>();
    for (const name of before) {
      if (!after.includes(name)) deltas.set(name, -1);
    }
    for (const name of after) {
      if (!before.includes(name)) deltas.set(name, 1);
    }

    for (const [name, delta] of deltas) {
      const entry = await this.store.getEntry<unknown>([Tag.definition.prefix, name]);
      const tag = entry.value === null ? Tag.create(name) : Tag.fromRecord(entry.value, entry.versionstamp);
      op.check({ key: tag.key, versionstamp: entry.versionstamp });

      if (tag.adjustUsage(delta) <= 0) {
        op.delete(tag.key);
        continue;
      }

      tag.assertValid();
      tag.touch();
      op.set(tag.key, tag.toRecord());
    }
  }

  // ============================================================================
  // Operation logs
  // ============================================================================

  /**
   * Operations recorded for a sticker, oldest first
   */
  async logsFor(stickerId: string): Promise<OperationLog[]> {
    const entries = await this.store.list<unknown>([OperationLog.definition.prefix, stickerId]);
    return entries
      .map(({ value, versionstamp }) => OperationLog.fromRecord(value, versionstamp))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}
