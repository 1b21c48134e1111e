import { createHash, randomUUID } from "node:crypto";

// Utility functions shared across the application
// Note: resolveModelId and getModelInfo are defined in constants.ts

export function generateRequestId(): string {
  return `chatcmpl-${randomUUID().replace(/-/g, "")}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function unixSeconds(ms: number = Date.now()): number {
  return Math.floor(ms / 1000);
}

export function hashText(text: string): string {
  return createHash("sha256").update(text).digest("hex").slice(0, 16);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
