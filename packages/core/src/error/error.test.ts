// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { invariant, unreachable } from "../utils/assert.js";
import { thrown } from "../testing/index.js";
import { getErrorMetadata, isErrorCode } from "./codes.js";
import { SwitchyardError, isSwitchyardError } from "./error.js";
import { translateError } from "./translate.js";

describe("SwitchyardError", () => {
  it("takes retryable and phase from the code table", () => {
    const error = new SwitchyardError("ALREADY_CLAIMED");

    expect(error.name).toBe("SwitchyardError");
    expect(error.message).toBe("Receiver already claimed");
    expect(error.retryable).toBe(false);
    expect(error.phase).toBe("runtime");
    expect(getErrorMetadata("DUPLICATE_REGISTRATION").phase).toBe("setup");
    expect(getErrorMetadata("ABORTED").retryable).toBe(true);
  });

  it("serializes to JSON without undefined details", () => {
    expect(new SwitchyardError("SEND_FAILED", "gone").toJSON()).toEqual({
      code: "SEND_FAILED",
      message: "gone",
      retryable: false,
      phase: "runtime",
    });
    expect(
      new SwitchyardError("PATHWAY_NOT_FOUND", "missing", {
        identity: "alerts",
      }).toJSON(),
    ).toEqual({
      code: "PATHWAY_NOT_FOUND",
      message: "missing",
      details: { identity: "alerts" },
      retryable: false,
      phase: "runtime",
    });
  });

  it("wrap() keeps an error that already has the code", () => {
    const original = new SwitchyardError("SEND_FAILED");
    expect(SwitchyardError.wrap(original, "SEND_FAILED")).toBe(original);

    const wrapped = SwitchyardError.wrap(new Error("boom"), "SEND_FAILED");
    expect(wrapped.code).toBe("SEND_FAILED");
    expect(wrapped.message).toBe("boom");
    expect(wrapped.cause).toBeInstanceOf(Error);
  });

  it("with() clones instead of mutating", () => {
    const original = new SwitchyardError("TYPE_MISMATCH", "bad", { a: 1 });
    const copy = original.with({ code: "INTERNAL_INCONSISTENCY" });

    expect(copy).not.toBe(original);
    expect(copy.code).toBe("INTERNAL_INCONSISTENCY");
    expect(copy.details).toEqual({ a: 1 });
    expect(original.code).toBe("TYPE_MISMATCH");
  });

  it("isSwitchyardError() narrows by code", () => {
    const error: unknown = new SwitchyardError("ABORTED");
    expect(isSwitchyardError(error)).toBe(true);
    expect(isSwitchyardError(error, "ABORTED")).toBe(true);
    expect(isSwitchyardError(error, "SEND_FAILED")).toBe(false);
    expect(isSwitchyardError(new Error("x"))).toBe(false);
  });

  it("isErrorCode() accepts only known codes", () => {
    expect(isErrorCode("LINK_NOT_FOUND")).toBe(true);
    expect(isErrorCode("toString")).toBe(false);
    expect(isErrorCode(42)).toBe(false);
  });
});

describe("translateError", () => {
  it("passes SwitchyardError through and wraps everything else", () => {
    const original = new SwitchyardError("SEND_FAILED");
    expect(translateError(original)).toBe(original);

    const translated = translateError("boom");
    expect(translated.code).toBe("INTERNAL_INCONSISTENCY");
    expect(translated.message).toBe("boom");
  });
});

describe("assertions", () => {
  it("raise INTERNAL_INCONSISTENCY", () => {
    expect(thrown(() => invariant(false, "count underflow"))).toMatchObject({
      code: "INTERNAL_INCONSISTENCY",
      message: "Invariant: count underflow",
    });
    expect(thrown(() => unreachable())).toMatchObject({
      code: "INTERNAL_INCONSISTENCY",
      message: "Unreachable: code path should not be reached",
    });
  });
});
