import { describe, expect, it } from "vitest";
import { generateCorrelationId, hashPassword, verifyPassword } from "@/shared/utils/crypto";

describe("crypto utilities", () => {
  it("hashes one-way and verifies the original password", async () => {
    const hash = await hashPassword("test-password", 4);

    expect(hash).not.toBe("test-password");
    expect(hash.startsWith("$2")).toBe(true);
    await expect(verifyPassword("test-password", hash)).resolves.toBe(true);
    await expect(verifyPassword("wrong-password", hash)).resolves.toBe(false);
  });

  it("salts each hash", async () => {
    const first = await hashPassword("same", 4);
    const second = await hashPassword("same", 4);

    expect(first).not.toBe(second);
  });

  it("generates v4 correlation ids", () => {
    const id = generateCorrelationId();

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateCorrelationId()).not.toBe(id);
  });
});
