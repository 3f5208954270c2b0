import { rm } from "node:fs/promises";

import {
  CancelledError,
  IsoAuthoringExhaustedError,
  ValidationFailure,
  throwIfCancelled,
} from "../errors.js";
import type { LoggerFn } from "../logger.js";
import { isNonEmptyFile } from "../utils/fsUtils.js";
import {
  assertValidationPassed,
  type ValidationResult,
} from "../validation/validateImage.js";
import type {
  AuthoringAttempt,
  AuthoringRequest,
  AuthoringStrategy,
  PipelineState,
  StrategyOutcome,
} from "./types.js";

export type AuthoringValidator = (
  outputPath: string,
  request: AuthoringRequest,
) => Promise<ValidationResult>;

export type AuthoringPipelineOpts = {
  strategies: readonly AuthoringStrategy[];
  request: AuthoringRequest;
  // omitted when validation is disabled
  validate?: AuthoringValidator;
  signal?: AbortSignal;
  log: LoggerFn;
  logWarn?: LoggerFn;
  onAttempt?: (attempt: AuthoringAttempt, index: number, total: number) => void;
  onState?: (state: PipelineState) => void;
};

export type AuthoringPipelineResult = {
  attempt: AuthoringAttempt;
  attempts: AuthoringAttempt[];
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function runStrategy(
  strategy: AuthoringStrategy,
  request: AuthoringRequest,
  signal?: AbortSignal,
): Promise<StrategyOutcome> {
  try {
    return await strategy.author(request, signal);
  } catch (err) {
    return { kind: "failed", reason: errorMessage(err) };
  }
}

/**
 * Tries each strategy once, in order, until one produces an image that passes
 * validation. Failed attempts have their partial output removed.
 */
export async function runAuthoringPipeline(
  opts: AuthoringPipelineOpts,
): Promise<AuthoringPipelineResult> {
  const { strategies, request, signal, log } = opts;
  const logWarn = opts.logWarn ?? log;
  const attempts: AuthoringAttempt[] = [];
  const total = strategies.length;
  const removeOutput = () => rm(request.outputPath, { force: true });

  opts.onState?.({ kind: "pending" });

  for (const [index, strategy] of strategies.entries()) {
    throwIfCancelled(signal, "ISO authoring");
    await removeOutput();
    opts.onState?.({ kind: "trying", index, strategyName: strategy.name });
    log("authoring attempt", {
      strategy: strategy.name,
      attempt: index + 1,
      total,
    });

    const startedAt = new Date();
    let outcome = await runStrategy(strategy, request, signal);

    if (signal?.aborted) {
      await removeOutput();
      throw new CancelledError(`ISO authoring (${strategy.name})`);
    }

    if (
      outcome.kind === "success" &&
      !(await isNonEmptyFile(request.outputPath))
    ) {
      outcome = {
        kind: "failed",
        reason:
          "strategy reported success but the output image is missing or empty",
      };
    }

    let validation: ValidationResult | undefined;
    if (outcome.kind === "success" && opts.validate) {
      try {
        validation = await opts.validate(request.outputPath, request);
        for (const warning of validation.warnings) {
          logWarn("validation warning", { strategy: strategy.name, warning });
        }
        assertValidationPassed(validation);
      } catch (err) {
        const reason =
          err instanceof ValidationFailure
            ? err.message
            : `validation error: ${errorMessage(err)}`;
        outcome = { kind: "failed", reason };
      }
    }

    const attempt: AuthoringAttempt = {
      strategyName: strategy.name,
      startedAt,
      finishedAt: new Date(),
      outcome,
      ...(validation ? { validation } : {}),
    };
    attempts.push(attempt);
    opts.onAttempt?.(attempt, index, total);

    if (outcome.kind === "success") {
      opts.onState?.({ kind: "succeeded", index, strategyName: strategy.name });
      log("authoring succeeded", {
        strategy: strategy.name,
        sizeBytes: outcome.sizeBytes,
      });
      return { attempt, attempts };
    }

    logWarn("authoring attempt failed", {
      strategy: strategy.name,
      reason: outcome.reason,
    });
    await removeOutput();
  }

  opts.onState?.({ kind: "failed" });
  throw new IsoAuthoringExhaustedError(attempts);
}
