/**
 * Zod schemas for issue payloads returned by the issue tool.
 *
 * The foreman holds only a cached view of each issue; the store is the system
 * of record. Fields the foreman does not read are passed through untouched.
 */

import { z } from 'zod'

export const IssueSchema = z
  .object({
    /** Stores hand out numeric or string ids; both are normalized to strings */
    id: z.union([z.string().min(1), z.number()]).transform((v) => String(v)),
    title: z
      .string()
      .nullish()
      .transform((v) => v ?? 'Untitled'),
    description: z
      .string()
      .nullish()
      .transform((v) => v ?? ''),
    status: z.string().nullish(),
    issue_type: z.string().nullish(),
    metadata: z.record(z.unknown()).nullish(),
    assignee: z.string().nullish(),
    block_reason: z.string().nullish(),
  })
  .passthrough()

export type Issue = z.output<typeof IssueSchema>

/** Output of a `list` operation */
export const IssueListOutputSchema = z.object({
  issues: z.array(z.unknown()),
})

/** Output of a `create` operation */
export const IssueCreatedOutputSchema = z.object({
  issue: z.unknown(),
})
