import { z } from "zod";
import type { LifestyleRecord } from "../lifestyle-types";
import type { EducationalContent, Insight } from "./insight.dto";

export const AUDIT_ACTIONS = [
  "record.stored",
  "insights.stored",
  "data.exported",
  "data.deleted",
  "analysis.failed",
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const encryptedPayloadSchema = z.object({
  algorithm: z.literal("aes-256-gcm"),
  /** base64 */
  nonce: z.string().min(1),
  /** base64, auth tag appended */
  ciphertext: z.string().min(1),
});

export type EncryptedPayload = z.infer<typeof encryptedPayloadSchema>;

export interface StoredUserData {
  records: LifestyleRecord[];
  insights: Insight[];
  content: EducationalContent[];
}

export interface DataExportResponse {
  userId: string;
  exportDate: string;
  format: "json";
  data: StoredUserData;
}

export interface DeletionConfirmation {
  userId: string;
  deletionDate: string;
  status: "completed";
  removed: {
    records: number;
    insights: number;
    content: number;
  };
}

export interface AuditLogEntry {
  id: string;
  userId: string;
  action: AuditAction;
  resource: string;
  details: Record<string, unknown> | null;
  createdAt: string;
}

export interface AuditLogResponse {
  data: AuditLogEntry[];
  total: number;
}
