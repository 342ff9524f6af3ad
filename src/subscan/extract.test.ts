import { describe, it, expect } from "vitest";
import {
  extractAddress,
  extractRecord,
  extractTransfer,
  NOT_AVAILABLE,
} from "./extract";
import { NETWORKS } from "./networks";
import { extrinsicSchema, type Extrinsic } from "./schema";

const DOT = NETWORKS.polkadot;
const KSM = NETWORKS.kusama;

describe("extractAddress", () => {
  it("returns plain strings as they are", () => {
    expect(extractAddress("1Alice")).toBe("1Alice");
  });

  it("returns the identity field of a MultiAddress", () => {
    expect(extractAddress({ Id: "1Bob" })).toBe("1Bob");
    expect(extractAddress({ id: "1Carol" })).toBe("1Carol");
  });

  it("falls back to the string form of other values", () => {
    expect(extractAddress({ Address20: "0x12" })).toBe('{"Address20":"0x12"}');
    expect(extractAddress(42)).toBe("42");
  });

  it("returns undefined for missing values", () => {
    expect(extractAddress(null)).toBeUndefined();
    expect(extractAddress(undefined)).toBeUndefined();
  });
});

describe("extractTransfer", () => {
  it("prefers the transfer object over call params", () => {
    const extrinsic: Extrinsic = {
      account_id: "1Alice",
      transfer: {
        amount: "25000000000",
        from: "1Alice",
        to: "1Bob",
        decimals: 10,
        symbol: "DOT",
      },
      params: [
        { name: "dest", value: { Id: "1Carol" } },
        { name: "value", value: "990000000000" },
      ],
    };

    expect(extractTransfer(extrinsic, DOT)).toEqual({
      source: "transfer",
      amount: "2.5000 DOT",
      from: "1Alice",
      to: "1Bob",
    });
  });

  it("uses the native token when the transfer has no decimals or symbol", () => {
    const extrinsic: Extrinsic = {
      account_id: "HAlice",
      transfer: { amount: "3000000000000", to: "HBob" },
    };

    const result = extractTransfer(extrinsic, KSM);

    expect(result.amount).toBe("3.0000 KSM");
    expect(result.from).toBe("HAlice");
    expect(result.to).toBe("HBob");
  });

  it("reports N/A for a non-numeric transfer amount", () => {
    const extrinsic: Extrinsic = {
      account_id: "1Alice",
      transfer: { amount: "lots", to: "1Bob" },
    };

    expect(extractTransfer(extrinsic, DOT).amount).toBe(NOT_AVAILABLE);
  });

  it("reports N/A for an oversized decimals value", () => {
    const extrinsic: Extrinsic = {
      account_id: "1Alice",
      transfer: { amount: "1", decimals: "100000000", to: "1Bob" },
    };

    const result = extractTransfer(extrinsic, DOT);

    expect(result.amount).toBe(NOT_AVAILABLE);
    expect(result.to).toBe("1Bob");
  });

  it("scans params for value and dest when there is no transfer", () => {
    const extrinsic: Extrinsic = {
      account_id: "1Alice",
      params: [
        { name: "dest", value: { Id: "1Bob" } },
        { name: "value", value: "123456789000" },
      ],
    };

    expect(extractTransfer(extrinsic, DOT)).toEqual({
      source: "params",
      amount: "12.3457 DOT",
      from: "1Alice",
      to: "1Bob",
    });
  });

  it("treats an empty transfer object as absent", () => {
    const extrinsic: Extrinsic = {
      account_id: "1Alice",
      transfer: {},
      params: [{ name: "value", value: 10_000_000_000 }],
    };

    const result = extractTransfer(extrinsic, DOT);

    expect(result.source).toBe("params");
    expect(result.amount).toBe("1.0000 DOT");
    expect(result.to).toBeUndefined();
  });

  it("keeps the destination when only dest is present", () => {
    const extrinsic: Extrinsic = {
      account_id: "1Alice",
      params: [{ name: "dest", value: "1Bob" }],
    };

    expect(extractTransfer(extrinsic, DOT)).toEqual({
      source: "params",
      amount: NOT_AVAILABLE,
      from: "1Alice",
      to: "1Bob",
    });
  });

  it("reports N/A when no param matches", () => {
    const extrinsic: Extrinsic = {
      account_id: "1Alice",
      params: [{ name: "remark", value: "0x00" }],
    };

    expect(extractTransfer(extrinsic, DOT)).toEqual({
      source: "none",
      amount: NOT_AVAILABLE,
      from: "1Alice",
    });
  });

  it("reads params sent as a JSON string", () => {
    const extrinsic = extrinsicSchema.parse({
      account_id: "1Alice",
      params: JSON.stringify([
        {
          name: "dest",
          type: "sp_runtime:multiaddress:MultiAddress",
          value: { Id: "1Bob" },
        },
        { name: "value", type: "compact<U128>", value: "50000000000" },
      ]),
    });

    expect(extractTransfer(extrinsic, DOT)).toEqual({
      source: "params",
      amount: "5.0000 DOT",
      from: "1Alice",
      to: "1Bob",
    });
  });
});

describe("extractRecord", () => {
  it("formats fees in the native token", () => {
    const extrinsic: Extrinsic = {
      account_id: "1Alice",
      fee: "157810000",
      fee_used: "150000000",
      transfer: { amount: "124670000000000", from: "1Alice", to: "1Bob" },
    };

    expect(extractRecord("0xabc", extrinsic, DOT)).toEqual({
      txHash: "0xabc",
      status: "Success",
      sender: "1Alice",
      from: "1Alice",
      to: "1Bob",
      transferAmount: "12,467.0000 DOT",
      estimatedFee: "0.015781 DOT",
      usedFee: "0.015 DOT",
    });
  });

  it("defaults missing fees to zero", () => {
    const extrinsic: Extrinsic = { account_id: "1Alice" };

    const record = extractRecord("0xabc", extrinsic, DOT);

    expect(record.estimatedFee).toBe("0 DOT");
    expect(record.usedFee).toBe("0 DOT");
    expect(record.transferAmount).toBe(NOT_AVAILABLE);
  });

  it("falls back to the display address for the sender", () => {
    const extrinsic: Extrinsic = {
      account_display: { address: "1Display" },
      fee: "0",
      fee_used: "0",
    };

    const record = extractRecord("0xabc", extrinsic, DOT);

    expect(record.sender).toBe("1Display");
    expect(record.from).toBe("1Display");
  });
});
