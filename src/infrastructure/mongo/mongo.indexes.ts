/**
 * Applied on first use; createIndex is idempotent.
 * - unique: { commentId: 1 } (insert-if-absent relies on it)
 * - { createdUtc: 1 } for resume (max) and stats (min/max)
 * - { date: 1 } for day-level reads
 */
export const mongoIndexes = {
  commentCollection: [
    { keys: { commentId: 1 }, options: { unique: true, name: "commentId_unique" } },
    { keys: { createdUtc: 1 }, options: { name: "createdUtc_asc" } },
    { keys: { date: 1 }, options: { name: "date_asc" } }
  ]
} as const;
