/**
 * Summary formatters
 */

import color from "picocolors";
import type { BorgStepResult, StepStatus } from "../../types";
import { formatDuration } from "../../utils/format";

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const shown = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...shown.map((i) => i.label.length));
  return shown.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

const STATUS_TEXT: Record<StepStatus, (text: string) => string> = {
  success: color.green,
  warning: color.yellow,
  error: color.red,
};

export function formatStepStatus(step: BorgStepResult): string {
  const text = step.status === "error" ? `error (exit ${step.exitCode})` : step.status;
  return `${STATUS_TEXT[step.status](text)} ${color.dim(formatDuration(step.durationMs))}`;
}
