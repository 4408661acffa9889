import { z } from "zod";
import { priorities } from "./constants.js";

export const queueSorts = ["oldest", "newest", "largest"] as const;
export type QueueSort = (typeof queueSorts)[number];

/** Query string of the review and finance work queues. */
export const queueQuerySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().positive().max(100).default(20),
  sort: z.enum(queueSorts).default("oldest"),
  priority: z.enum(priorities).optional(),
});

export type QueueQuery = z.infer<typeof queueQuerySchema>;

export interface QueuePage<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  pages: number;
  sort: QueueSort;
}

export function toPageRequest(query: QueueQuery): { skip: number; limit: number; sort: QueueSort } {
  return { skip: (query.page - 1) * query.limit, limit: query.limit, sort: query.sort };
}

export function queuePage<T>(data: T[], total: number, query: QueueQuery): QueuePage<T> {
  return {
    data,
    total,
    page: query.page,
    limit: query.limit,
    pages: Math.ceil(total / query.limit),
    sort: query.sort,
  };
}
