import { MongoClient, type AnyBulkWriteOperation, type Collection } from "mongodb";
import type {
  CommentDoc,
  CommentRepository,
  CommentStoreStats,
  CommitResult
} from "../../ports/CommentRepository";
import { mongoIndexes } from "./mongo.indexes";

/**
 * Keeps the first doc seen per commentId. Records are immutable, so a later
 * copy inside the same batch must not win either.
 */
export const dedupeCommentDocsById = (docs: CommentDoc[]): CommentDoc[] => {
  const byId = new Map<string, CommentDoc>();
  for (const doc of docs) {
    if (!byId.has(doc.commentId)) byId.set(doc.commentId, doc);
  }
  return Array.from(byId.values());
};

/**
 * Mongo repository with insert-if-absent semantics ($setOnInsert upserts on
 * a unique `commentId`). Writes are staged in memory and flushed by commit().
 */
export class MongoCommentRepository implements CommentRepository {
  private client?: MongoClient;
  private collection?: Collection<CommentDoc>;
  private staged: CommentDoc[] = [];

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "comment_archive",
    private readonly collectionName = "comments"
  ) {}

  private async getCollection(): Promise<Collection<CommentDoc>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const db = this.client.db(this.dbName);
    const col = db.collection<CommentDoc>(this.collectionName);

    for (const idx of mongoIndexes.commentCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  private async edgeDoc(direction: 1 | -1): Promise<CommentDoc | null> {
    const col = await this.getCollection();
    return col.find({}, { projection: { _id: 0 } }).sort({ createdUtc: direction }).limit(1).next();
  }

  async latestIngestedTime(): Promise<number | undefined> {
    const newest = await this.edgeDoc(-1);
    return newest?.createdUtc;
  }

  async count(): Promise<number> {
    const col = await this.getCollection();
    return col.countDocuments();
  }

  async insertManyIfAbsent(docs: CommentDoc[]): Promise<void> {
    this.staged.push(...docs);
  }

  async commit(): Promise<CommitResult> {
    if (this.staged.length === 0) {
      return { inserted: 0, duplicates: 0 };
    }

    const stagedCount = this.staged.length;
    const docs = dedupeCommentDocsById(this.staged);
    const col = await this.getCollection();
    const ops: AnyBulkWriteOperation<CommentDoc>[] = docs.map((doc) => ({
      updateOne: {
        filter: { commentId: doc.commentId },
        update: { $setOnInsert: doc },
        upsert: true
      }
    }));

    const res = await col.bulkWrite(ops, { ordered: false });
    this.staged = [];

    const inserted = res.upsertedCount ?? 0;
    return { inserted, duplicates: stagedCount - inserted };
  }

  async stats(): Promise<CommentStoreStats> {
    const total = await this.count();
    if (total === 0) return { total };

    const [oldest, newest] = await Promise.all([this.edgeDoc(1), this.edgeDoc(-1)]);
    return { total, minDate: oldest?.date, maxDate: newest?.date };
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
