import { Inject, Injectable, Logger } from "@nestjs/common";
import type { EncryptedPayload } from "@habitlens/shared";
import * as crypto from "crypto";
import type { ZodType, ZodTypeDef } from "zod";
import { PIPELINE_CONFIG } from "../config/pipeline.config";
import type { PipelineConfig } from "../config/pipeline.config";

const KEY_LENGTH = 32; // AES-256
const NONCE_LENGTH = 12; // GCM standard
const TAG_LENGTH = 16; // GCM auth tag
const ALGORITHM = "aes-256-gcm";

@Injectable()
export class EncryptionService {
  private readonly logger = new Logger(EncryptionService.name);
  private readonly key: Buffer;

  constructor(@Inject(PIPELINE_CONFIG) config: PipelineConfig) {
    if (config.encryptionKey) {
      this.key = config.encryptionKey;
    } else {
      this.logger.warn("DATA_ENCRYPTION_KEY is not set; stored data is encrypted with a per-process key");
      this.key = crypto.randomBytes(KEY_LENGTH);
    }
  }

  /** Returns: nonce (12) || ciphertext || tag (16) */
  encrypt(plaintext: Buffer): Buffer {
    const nonce = crypto.randomBytes(NONCE_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, nonce);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
  }

  /** Input: nonce (12) || ciphertext || tag (16) */
  decrypt(blob: Buffer): Buffer {
    const nonce = blob.subarray(0, NONCE_LENGTH);
    const tag = blob.subarray(blob.length - TAG_LENGTH);
    const ciphertext = blob.subarray(NONCE_LENGTH, blob.length - TAG_LENGTH);
    const decipher = crypto.createDecipheriv(ALGORITHM, this.key, nonce);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  }

  /** JSON-serialises `value` and encrypts it; the auth tag travels at the end of `ciphertext`. */
  encryptData(value: unknown): EncryptedPayload {
    const blob = this.encrypt(Buffer.from(JSON.stringify(value), "utf8"));
    return {
      algorithm: ALGORITHM,
      nonce: blob.subarray(0, NONCE_LENGTH).toString("base64"),
      ciphertext: blob.subarray(NONCE_LENGTH).toString("base64"),
    };
  }

  /** Decrypts and checks the value against `schema`. Throws on tampering or a shape mismatch. */
  decryptData<T>(payload: EncryptedPayload, schema: ZodType<T, ZodTypeDef, unknown>): T {
    const blob = Buffer.concat([
      Buffer.from(payload.nonce, "base64"),
      Buffer.from(payload.ciphertext, "base64"),
    ]);
    return schema.parse(JSON.parse(this.decrypt(blob).toString("utf8")));
  }
}
