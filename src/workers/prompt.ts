/**
 * Prompt construction shared by the model-backed workers.
 */

import type { WorkerTask } from "./types.js";

export function buildTaskPrompt(task: WorkerTask): string {
  let prompt = `You are an expert software engineer. Complete the following task:\n\n## Task\n${task.title}\n\n`;
  if (task.description.trim()) {
    prompt += `## Details\n${task.description.trim()}\n\n`;
  }
  prompt +=
    "## Instructions\n" +
    "- Provide clear, working code\n" +
    "- Include brief explanations for non-obvious decisions\n" +
    "- If the task is ambiguous, state your assumptions\n" +
    "- Format code properly with appropriate language tags\n\n" +
    "## Response\n";
  return prompt;
}

const QUOTA_MARKERS = ["credit", "quota", "balance", "payment", "billing", "429", "resource exhausted", "rate limit"];

/** True when an error message reads like a quota or payment failure. */
export function looksLikeQuotaError(message: string): boolean {
  const lower = message.toLowerCase();
  return QUOTA_MARKERS.some((m) => lower.includes(m));
}
