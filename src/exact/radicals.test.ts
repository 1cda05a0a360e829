/**
 * Tests for square-free radicand arithmetic and canonical bases.
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "../errors";
import {
  basisProducts,
  gcd,
  isSquareFree,
  radicandClosure,
  spanningGenerators,
  squareFreeDecompose,
  squareFreeProduct,
} from "./radicals";

describe("gcd", () => {
  it("is non-negative", () => {
    expect(gcd(-12n, 18n)).toBe(6n);
    expect(gcd(12n, -18n)).toBe(6n);
  });

  it("treats zero as the identity", () => {
    expect(gcd(0n, 7n)).toBe(7n);
    expect(gcd(0n, 0n)).toBe(0n);
  });
});

describe("squareFreeDecompose", () => {
  it("splits n into k²·r", () => {
    expect(squareFreeDecompose(72n)).toEqual({ square: 6n, radicand: 2n });
    expect(squareFreeDecompose(49n)).toEqual({ square: 7n, radicand: 1n });
    expect(squareFreeDecompose(30n)).toEqual({ square: 1n, radicand: 30n });
  });

  it("decomposes 0 as 0²·1", () => {
    expect(squareFreeDecompose(0n)).toEqual({ square: 0n, radicand: 1n });
  });

  it("rejects negative input", () => {
    expect(() => squareFreeDecompose(-2n)).toThrow(InvalidArgumentError);
  });
});

describe("isSquareFree", () => {
  it("accepts only positive square-free integers", () => {
    expect(isSquareFree(1n)).toBe(true);
    expect(isSquareFree(6n)).toBe(true);
    expect(isSquareFree(12n)).toBe(false);
    expect(isSquareFree(0n)).toBe(false);
    expect(isSquareFree(-3n)).toBe(false);
  });
});

describe("squareFreeProduct", () => {
  it("pulls the common factor out of the root", () => {
    expect(squareFreeProduct(6n, 10n)).toEqual({ factor: 2n, radicand: 15n });
    expect(squareFreeProduct(2n, 3n)).toEqual({ factor: 1n, radicand: 6n });
    expect(squareFreeProduct(5n, 5n)).toEqual({ factor: 5n, radicand: 1n });
  });
});

describe("basisProducts", () => {
  it("indexes radicands by generator bitmask", () => {
    expect(basisProducts([])).toEqual([1n]);
    expect(basisProducts([2n, 3n])).toEqual([1n, 2n, 3n, 6n]);
    expect(basisProducts([6n, 10n])).toEqual([1n, 6n, 10n, 15n]);
  });
});

describe("radicandClosure", () => {
  it("contains every square-free product of the inputs", () => {
    const closure = radicandClosure([6n, 10n]);
    expect([...closure].sort((a, b) => Number(a - b))).toEqual([1n, 6n, 10n, 15n]);
  });
});

describe("spanningGenerators", () => {
  it("picks the smallest unreachable values in ascending order", () => {
    expect(spanningGenerators([6n, 10n, 15n])).toEqual([6n, 10n]);
    expect(spanningGenerators([2n, 6n])).toEqual([2n, 3n]);
    expect(spanningGenerators([6n])).toEqual([6n]);
  });

  it("depends only on the span, not on the inputs that produced it", () => {
    expect(spanningGenerators([3n, 6n])).toEqual(spanningGenerators([2n, 3n]));
    expect(spanningGenerators([15n, 10n])).toEqual(spanningGenerators([6n, 15n]));
  });

  it("ignores the rational radicand", () => {
    expect(spanningGenerators([1n])).toEqual([]);
    expect(spanningGenerators([])).toEqual([]);
  });
});
