import { describe, expect, it } from "vitest";
import { EscalationRule } from "../src/domain/task-policy";
import { createEscalation, scaleResource } from "../src/escalation";
import { GIB, HOUR_MS } from "../src/units";

const base = { cpus: 2, memory: 4 * GIB, time: HOUR_MS };

describe("createEscalation", () => {
  it("keeps cpus and grows memory and time with the attempt by default", () => {
    const escalate = createEscalation(base, EscalationRule.parse({}));
    expect(escalate(1)).toEqual(base);
    expect(escalate(3)).toEqual({ cpus: 2, memory: 12 * GIB, time: 3 * HOUR_MS });
  });

  it("doubles per attempt in exponential mode", () => {
    const escalate = createEscalation(base, EscalationRule.parse({ memory: "exponential" }));
    expect(escalate(3).memory).toBe(16 * GIB);
  });

  it("never shrinks a request across attempts", () => {
    for (const mode of ["constant", "linear", "exponential"] as const) {
      const escalate = createEscalation(
        base,
        EscalationRule.parse({ cpus: mode, memory: mode, time: mode }),
      );
      for (let attempt = 2; attempt <= 10; attempt += 1) {
        const previous = escalate(attempt - 1);
        const current = escalate(attempt);
        expect(current.memory).toBeGreaterThanOrEqual(previous.memory);
        expect(current.time).toBeGreaterThanOrEqual(previous.time);
        expect(current.cpus).toBeGreaterThanOrEqual(previous.cpus);
      }
    }
  });

  it("rejects attempt numbers below one", () => {
    const escalate = createEscalation(base, EscalationRule.parse({}));
    expect(() => escalate(0)).toThrow(RangeError);
  });

  it("scales single values", () => {
    expect(scaleResource(3, "constant", 5)).toBe(3);
    expect(scaleResource(3, "linear", 5)).toBe(15);
    expect(scaleResource(3, "exponential", 5)).toBe(48);
  });
});
