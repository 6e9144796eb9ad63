/**
 * Symbol Classification Tests
 */

import { describe, it, expect } from "vitest";
import {
  OPTION_MULTIPLIER,
  contractSize,
  extractOptionDetails,
  extractUnderlying,
  futuresRoot,
  isFuturesSymbol,
  isOption,
  valueMultiplier,
} from "../../src/utils/symbols.js";

describe("isOption", () => {
  it("should recognise OCC option symbols", () => {
    expect(isOption("AAPL240119C00150000")).toBe(true);
    expect(isOption("SPY   240621P00500000")).toBe(true);
  });

  it("should reject equities and futures", () => {
    expect(isOption("AAPL")).toBe(false);
    expect(isOption("/ESZ24")).toBe(false);
  });
});

describe("extractOptionDetails", () => {
  it("should parse underlying, expiry, right and strike", () => {
    const details = extractOptionDetails("AAPL240119C00150000");
    expect(details).not.toBeNull();
    expect(details?.underlying).toBe("AAPL");
    expect(details?.type).toBe("call");
    expect(details?.strike).toBe(150);
    expect(details?.expiration.toISOString()).toBe("2024-01-19T00:00:00.000Z");
  });

  it("should parse fractional strikes on puts", () => {
    const details = extractOptionDetails("F240315P00012500");
    expect(details?.underlying).toBe("F");
    expect(details?.type).toBe("put");
    expect(details?.strike).toBe(12.5);
  });
});

describe("extractUnderlying", () => {
  it("should return the option's underlying", () => {
    expect(extractUnderlying("TSLA240621P00180000")).toBe("TSLA");
  });

  it("should return equities and futures unchanged", () => {
    expect(extractUnderlying("MSFT")).toBe("MSFT");
    expect(extractUnderlying("/NQH25")).toBe("/NQH25");
  });
});

describe("futures", () => {
  it("should recognise slash-prefixed futures symbols", () => {
    expect(isFuturesSymbol("/ESZ24")).toBe(true);
    expect(isFuturesSymbol("/MNQH5")).toBe(true);
    expect(isFuturesSymbol("ESZ24")).toBe(false);
  });

  it("should split the root off month and year", () => {
    expect(futuresRoot("/ESZ24")).toBe("ES");
    expect(futuresRoot("/MNQH5")).toBe("MNQ");
    expect(futuresRoot("/ZNH5")).toBe("ZN");
    expect(futuresRoot("AAPL")).toBeNull();
  });

  it("should look up contract sizes by root", () => {
    expect(contractSize("/ESZ24")).toBe(50);
    expect(contractSize("/CLF25")).toBe(1000);
    expect(contractSize("/MNQH5")).toBe(2);
  });

  it("should default unknown roots and non-futures to 1", () => {
    expect(contractSize("/XYZZ4")).toBe(1);
    expect(contractSize("AAPL")).toBe(1);
  });
});

describe("valueMultiplier", () => {
  it("should pick the multiplier by instrument", () => {
    expect(valueMultiplier("AAPL")).toBe(1);
    expect(valueMultiplier("AAPL240119C00150000")).toBe(OPTION_MULTIPLIER);
    expect(valueMultiplier("/GCZ24")).toBe(100);
  });
});
