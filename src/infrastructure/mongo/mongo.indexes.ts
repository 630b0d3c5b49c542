import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan for the run ledger:
 * - { startedAt: -1 } for "latest runs" queries
 * - { updatedGraphs: 1, startedAt: -1 } to find the last rebuild of a graph
 */
export const mongoIndexes: {
  updateRunCollection: { keys: IndexSpecification; options: CreateIndexesOptions }[];
} = {
  updateRunCollection: [
    { keys: { startedAt: -1 }, options: { name: "startedAt_desc" } },
    { keys: { updatedGraphs: 1, startedAt: -1 }, options: { name: "updatedGraphs_startedAt" } }
  ]
};
