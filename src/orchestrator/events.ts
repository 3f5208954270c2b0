import type { AuthoringAttempt } from "../authoring/types.js";
import type { SourceMetadata } from "../metadata/sourceMetadata.js";
import type { ValidationResult } from "../validation/validateImage.js";

export type StageEvent =
  | {
      stage: "environment_checked";
      authoringTools: string[];
      libraryAvailable: boolean;
    }
  | { stage: "metadata_extracted"; metadata: SourceMetadata }
  | {
      stage: "target_extracted";
      sourceDir: string;
      bootContainer: string;
      installContainer: string | null;
    }
  | { stage: "registry_patched"; patchedIndex: number; writes: number }
  | { stage: "install_rebranded"; images: number }
  | {
      stage: "image_authored";
      attempt: AuthoringAttempt;
      index: number;
      total: number;
    }
  | { stage: "validation_completed"; result: ValidationResult | null }
  | { stage: "output_written"; outputPath: string; sizeBytes: number };

export type StageName = StageEvent["stage"];

export type StageEventSink = (event: StageEvent) => void;

export function describeStageEvent(event: StageEvent): string {
  switch (event.stage) {
    case "environment_checked": {
      const tools = event.libraryAvailable
        ? [...event.authoringTools, "library"]
        : event.authoringTools;
      return `environment ok (authoring: ${tools.join(", ")})`;
    }
    case "metadata_extracted": {
      const { productName, buildNumber, volumeLabel } = event.metadata;
      return (
        `reference is ${productName} build ${buildNumber}, ` +
        `label ${volumeLabel}`
      );
    }
    case "target_extracted":
      return `target extracted to ${event.sourceDir}`;
    case "registry_patched":
      return (
        `boot image ${event.patchedIndex} patched with ` +
        `${event.writes} registry values`
      );
    case "install_rebranded":
      return `install container: ${event.images} image(s) rebranded`;
    case "image_authored": {
      const { strategyName, outcome } = event.attempt;
      const status = outcome.kind === "success" ? "ok" : outcome.reason;
      const position = `${event.index + 1}/${event.total}`;
      return `authoring ${position} ${strategyName}: ${status}`;
    }
    case "validation_completed":
      if (!event.result) return "validation skipped";
      return `validation ${event.result.overallPass ? "passed" : "failed"}`;
    case "output_written":
      return `wrote ${event.outputPath}`;
  }
}
