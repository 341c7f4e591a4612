import type { FastifyBaseLogger, FastifyReply } from "fastify";
import type { ZodError } from "zod";
import type { TransactionOutput } from "../interfaces";
import { BlockRejectedError, InvalidBlockIdError, LedgerError } from "../ledger/errors";
import type { DistributionOutcome, MintedReward } from "../ledger/rewards";
import type { Verdict } from "../ledger/validator";

export function outputJson(output: TransactionOutput) {
  return { value: output.value.toString(), ownerKey: output.ownerKey };
}

function rewardJson(reward: MintedReward) {
  return { id: reward.id, ...outputJson(reward.output) };
}

export function verdictJson(verdict: Verdict) {
  switch (verdict.status) {
    case 'FullyValid':
      return { status: verdict.status, requires: [], provides: verdict.provides, reward: verdict.reward.toString() };
    case 'Pending':
      return { status: verdict.status, requires: verdict.requires, provides: verdict.provides };
    case 'Rejected':
      return { status: verdict.status, error: verdict.error };
  }
}

export function distributionJson(outcome: DistributionOutcome) {
  switch (outcome.kind) {
    case 'DistributionSkipped':
      return { kind: outcome.kind, reason: outcome.reason, pooled: outcome.pooled.toString() };
    case 'Deferred':
      return { kind: outcome.kind, pooled: outcome.pooled.toString() };
    case 'Distributed':
      return {
        kind: outcome.kind,
        share: outcome.share.toString(),
        remainder: outcome.remainder.toString(),
        minted: outcome.minted.map(rewardJson),
        wasted: outcome.wasted.map(rewardJson),
      };
  }
}

export function sendInvalidBody(reply: FastifyReply, error: ZodError) {
  return reply.status(400).send({
    error: 'Invalid request',
    details: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
}

export function sendFailure(log: FastifyBaseLogger, reply: FastifyReply, error: unknown, fallback: string) {
  if (error instanceof BlockRejectedError) {
    return reply.status(400).send({
      error: error.message,
      code: error.code,
      index: error.index,
      reason: error.reason,
      requires: error.requires,
    });
  }
  if (error instanceof InvalidBlockIdError) {
    return reply.status(400).send({ error: error.message, code: error.code, expected: error.expected });
  }
  if (error instanceof LedgerError) {
    return reply.status(400).send({ error: error.message, code: error.code });
  }
  log.error({ err: error }, fallback);
  return reply.status(500).send({ error: fallback, details: String(error) });
}
