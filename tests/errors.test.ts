import { describe, it, expect } from "vitest";
import {
  classifyError,
  ConfigError,
  InsufficientDataError,
  PersistenceError,
  toPersistenceError,
  TransientError,
} from "../src/errors.js";
import { describeFailure } from "../src/services/monitor.js";

describe("error taxonomy", () => {
  it("names each error after its class", () => {
    expect(new TransientError("timeout").name).toBe("TransientError");
    expect(new ConfigError("bad").kind).toBe("fatal");
  });

  it("treats raw errors as transient", () => {
    const raw = new Error("ECONNRESET");
    const error = classifyError(raw);
    expect(error).toBeInstanceOf(TransientError);
    expect(error.message).toBe("ECONNRESET");
    expect(error.cause).toBe(raw);
    expect(classifyError("socket hang up").message).toBe("socket hang up");
  });

  it("keeps the kind of a classified error", () => {
    const missing = new InsufficientDataError("no closes");
    expect(classifyError(missing)).toBe(missing);
    expect(toPersistenceError(missing)).toBe(missing);
  });

  it("treats raw store errors as persistence failures", () => {
    const error = toPersistenceError(new Error("relation does not exist"));
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error.kind).toBe("persistence");
  });

  it("describes a failure with its kind", () => {
    expect(describeFailure(new Error("timeout"))).toBe("[transient] timeout");
    expect(describeFailure(new InsufficientDataError("No price in quote for SAP.DE"))).toBe(
      "[insufficient-data] No price in quote for SAP.DE",
    );
  });
});
