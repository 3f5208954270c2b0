import type { ValidationResult } from "../validation/validateImage.js";

export type BootCatalogSpec = {
  // paths relative to the source tree, forward slashes, null when absent
  bios: string | null;
  uefi: string | null;
  bootmgr: string | null;
};

export type AuthoringRequest = {
  sourceDir: string;
  outputPath: string;
  volumeLabel: string;
  applicationId?: string;
  publisherId?: string;
  boot: BootCatalogSpec;
  // size of the source tree, used by validation
  expectedBytes: number;
};

export type StrategyOutcome =
  | { kind: "success"; outputPath: string; sizeBytes: number }
  | { kind: "failed"; reason: string };

export type AuthoringStrategy = {
  name: string;
  author(
    request: AuthoringRequest,
    signal?: AbortSignal,
  ): Promise<StrategyOutcome>;
};

export type AuthoringAttempt = {
  strategyName: string;
  startedAt: Date;
  finishedAt: Date;
  outcome: StrategyOutcome;
  validation?: ValidationResult;
};

export type PipelineState =
  | { kind: "pending" }
  | { kind: "trying"; index: number; strategyName: string }
  | { kind: "succeeded"; index: number; strategyName: string }
  | { kind: "failed" };
