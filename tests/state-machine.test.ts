import { describe, expect, it } from "vitest";
import {
  assertStatusIn,
  assertTransition,
  balanceBucketFor,
  canTransition,
  isRecreatableStatus,
} from "../src/domain/state-machine.js";
import { AppError } from "../src/infra/app-error.js";

describe("Payment state machine", () => {
  it("allows valid transitions", () => {
    expect(canTransition("nonexistent", "active")).toBe(true);
    expect(canTransition("active", "cleared")).toBe(true);
    expect(canTransition("active", "merged")).toBe(true);
    expect(canTransition("cleared", "active")).toBe(true);
    expect(canTransition("cleared", "confirmed")).toBe(true);
    expect(canTransition("cleared", "revoked")).toBe(true);
    expect(canTransition("revoked", "active")).toBe(true);
  });

  it("blocks invalid transitions", () => {
    expect(canTransition("active", "confirmed")).toBe(false);
    expect(canTransition("cleared", "merged")).toBe(false);
    expect(canTransition("reversed", "active")).toBe(false);
    expect(canTransition("confirmed", "active")).toBe(false);
    expect(() => assertTransition("pay_1", "active", "confirmed")).toThrowError(AppError);
  });

  it("reports the current and requested status on a rejected transition", () => {
    try {
      assertTransition("pay_1", "merged", "active");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      if (error instanceof AppError) {
        expect(error.statusCode).toBe(409);
        expect(error.code).toBe("inappropriate_payment_status");
        expect(error.details).toEqual({
          payment_id: "pay_1",
          current_status: "merged",
          requested_status: "active",
        });
      }
    }
  });

  it("checks operation preconditions", () => {
    expect(() => assertStatusIn("pay_1", "cleared", ["active", "cleared"], "refund")).not.toThrow();
    expect(() => assertStatusIn("pay_1", "merged", ["active", "cleared"], "refund")).toThrowError(AppError);
  });

  it("lets only unused and revoked ids be made again", () => {
    expect(isRecreatableStatus("nonexistent")).toBe(true);
    expect(isRecreatableStatus("revoked")).toBe(true);
    expect(isRecreatableStatus("reversed")).toBe(false);
    expect(isRecreatableStatus("active")).toBe(false);
  });

  it("maps statuses to balance buckets", () => {
    expect(balanceBucketFor("active")).toBe("uncleared");
    expect(balanceBucketFor("cleared")).toBe("cleared");
    expect(balanceBucketFor("confirmed")).toBeNull();
    expect(balanceBucketFor("revoked")).toBeNull();
  });
});
