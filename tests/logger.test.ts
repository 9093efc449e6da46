import { describe, it, expect } from "vitest";
import { redact } from "../src/lib/logger";

describe("redact", () => {
  it("masks password fields at any depth", () => {
    const meta = {
      name: "h1",
      initiators: [
        {
          portName: "iqn.2001-05.com.example:h1",
          chapSingleUsername: "chap-user",
          chapSinglePassword: "test-secret",
          chapMutualPassword: "test-mutual-secret",
        },
      ],
    };

    expect(redact(meta)).toEqual({
      name: "h1",
      initiators: [
        {
          portName: "iqn.2001-05.com.example:h1",
          chapSingleUsername: "chap-user",
          chapSinglePassword: "***",
          chapMutualPassword: "***",
        },
      ],
    });
  });

  it("does not mutate the input", () => {
    const meta = { password: "test-secret" };
    redact(meta);
    expect(meta.password).toBe("test-secret");
  });

  it("leaves absent secrets alone", () => {
    expect(redact({ password: undefined, other: null })).toEqual({ password: undefined, other: null });
  });

  it("serialises errors", () => {
    const err = new Error("boom");
    const out = redact({ err });
    expect(out).toMatchObject({ err: { message: "boom", name: "Error" } });
  });

  it("keeps only scalar fields of errors and their causes", () => {
    const inner = Object.assign(new Error("Request failed with status code 500"), {
      code: "ERR_BAD_RESPONSE",
      config: { data: '{"chap_single_password":"test-secret"}', headers: { Authorization: "Basic dGVzdA==" } },
    });
    const outer = Object.assign(new Error("create failed", { cause: inner }), {
      status: 500,
      initiators: ["iqn.2024-01.com.example:h1"],
    });

    const out = redact({ err: outer });

    expect(out).toMatchObject({
      err: {
        message: "create failed",
        status: 500,
        initiators: ["iqn.2024-01.com.example:h1"],
        cause: { message: "Request failed with status code 500", code: "ERR_BAD_RESPONSE" },
      },
    });
    expect(JSON.stringify(out)).not.toContain("test-secret");
    expect(JSON.stringify(out)).not.toContain("Authorization");
  });

  it("survives circular references", () => {
    const node: Record<string, unknown> = { id: "a" };
    node.self = node;
    expect(redact(node)).toEqual({ id: "a", self: "[circular]" });
  });
});
