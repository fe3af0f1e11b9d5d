/**
 * Complex scalar arithmetic.
 */

import type { Complex } from "../types/index.js";

export const ZERO: Readonly<Complex> = Object.freeze({ re: 0, im: 0 });

/**
 * Build a complex number.
 *
 * @example
 * ```ts
 * complex(1); // { re: 1, im: 0 }
 * complex(0, -1); // { re: 0, im: -1 }
 * ```
 */
export function complex(re: number, im = 0): Complex {
  return { re, im };
}

export function add(a: Complex, b: Complex): Complex {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function mul(a: Complex, b: Complex): Complex {
  return {
    re: a.re * b.re - a.im * b.im,
    im: a.re * b.im + a.im * b.re,
  };
}

export function conj(a: Complex): Complex {
  return { re: a.re, im: -a.im };
}

/**
 * Multiply by a real factor.
 */
export function scale(a: Complex, factor: number): Complex {
  return { re: a.re * factor, im: a.im * factor };
}
