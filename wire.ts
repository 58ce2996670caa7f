import { z } from "zod";

// Shapes only. Linkage and proofs are checked by validateChain().

export const transactionSchema = z.object({
  sender: z.string({ required_error: "sender is required" }),
  recipient: z.string({ required_error: "recipient is required" }),
  amount: z.number({ required_error: "amount is required" }).finite(),
}).strict();

export const blockSchema = z.object({
  index: z.number().int().nonnegative(),
  timestamp: z.number().finite(),
  transactions: z.array(transactionSchema),
  proof: z.number().int().nonnegative().safe(),
  previousHash: z.string(),
}).strict();

export const chainSchema = z.array(blockSchema).min(1, "chain is empty");

export const chainResponseSchema = z.object({
  chain: chainSchema,
  length: z.number().int(),
}).refine((r) => r.length === r.chain.length, { message: "length does not match chain" });

export const registerNodesSchema = z.object({
  nodes: z.array(z.string()).min(1, "Please supply a valid list of nodes"),
});

export const SNAPSHOT_VERSION = 1;

export const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  chain: chainSchema,
});

export function firstIssue(err: z.ZodError): string {
  const issue = err.issues[0];
  if (!issue) return "invalid input";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
