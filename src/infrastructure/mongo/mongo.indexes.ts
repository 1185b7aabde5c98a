/**
 * Index plan applied on first use:
 * - { inputFile: 1, finishedAt: -1 } for "last run over this file" reads
 */
export const mongoIndexes = {
  runCollection: [
    { keys: { inputFile: 1, finishedAt: -1 }, options: {} }
  ]
} as const;
