import { describe, expect, it } from "vitest";
import { isActiveSubscription } from "@/lib/entitlements";

const AT = new Date("2024-05-01T00:00:00.000Z");

describe("isActiveSubscription", () => {
  it("accepts active and trialing rows for the subject or for every subject", () => {
    expect(isActiveSubscription({ subject_id: "biology", status: "active", current_period_end: null }, "biology", AT)).toBe(true);
    expect(isActiveSubscription({ subject_id: null, status: " Trialing ", current_period_end: null }, "physics", AT)).toBe(true);
  });

  it("rejects other subjects, lapsed periods and inactive statuses", () => {
    expect(isActiveSubscription({ subject_id: "physics", status: "active", current_period_end: null }, "biology", AT)).toBe(false);
    expect(
      isActiveSubscription({ subject_id: null, status: "active", current_period_end: "2024-05-01T00:00:00.000Z" }, "biology", AT)
    ).toBe(false);
    expect(isActiveSubscription({ subject_id: null, status: "canceled", current_period_end: null }, "biology", AT)).toBe(false);
  });

  it("ignores an unparseable period end", () => {
    expect(isActiveSubscription({ subject_id: null, status: "active", current_period_end: "soon" }, "biology", AT)).toBe(true);
  });
});
