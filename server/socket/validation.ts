/**
 * Socket Event Validation
 *
 * Zod schemas for validating incoming socket events.
 * Prevents malformed data from reaching the battle core.
 */

import { z } from "zod";
import { INVITE_CODE_ALPHABET, INVITE_CODE_LENGTH, OPTIONS_PER_ROUND } from "../config/constants";

// Strict ID pattern to prevent log injection and special character abuse
const safeId = z.string().regex(/^[a-zA-Z0-9_-]{1,100}$/, "Invalid ID format");

const inviteCode = z
  .string()
  .trim()
  .toUpperCase()
  .refine(
    (code) => code.length === INVITE_CODE_LENGTH && [...code].every((c) => INVITE_CODE_ALPHABET.includes(c)),
    "Invalid invite code"
  );

export const acceptInviteSchema = z.object({
  code: inviteCode,
});

export const submitAnswerSchema = z.object({
  sessionId: safeId,
  roundIndex: z.number().int().min(0).max(1000),
  selectedIndex: z
    .number()
    .int()
    .min(0)
    .max(OPTIONS_PER_ROUND - 1),
});

export const leaveSessionSchema = z.object({
  sessionId: safeId,
});

/**
 * Validate event data and return typed result
 */
export function validateEvent<T>(
  schema: z.ZodSchema<T>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", "),
  };
}
