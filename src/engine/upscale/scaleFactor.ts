// Rational scale factor arithmetic

import { PipelineConfigError } from './errors';
import type { ScaleFactor } from './types';

export const UNIT_SCALE: ScaleFactor = { numerator: 1, denominator: 1 };

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    const t = y;
    y = x % y;
    x = t;
  }
  return x;
}

export function isValidScaleFactor(factor: ScaleFactor): boolean {
  return Number.isInteger(factor.numerator) && factor.numerator > 0 &&
    Number.isInteger(factor.denominator) && factor.denominator > 0;
}

export function reduceScaleFactor(factor: ScaleFactor): ScaleFactor {
  const divisor = gcd(factor.numerator, factor.denominator);
  return {
    numerator: factor.numerator / divisor,
    denominator: factor.denominator / divisor,
  };
}

export function multiplyScaleFactors(a: ScaleFactor, b: ScaleFactor): ScaleFactor {
  return reduceScaleFactor({
    numerator: a.numerator * b.numerator,
    denominator: a.denominator * b.denominator,
  });
}

export function isSameScaleFactor(a: ScaleFactor, b: ScaleFactor): boolean {
  return a.numerator * b.denominator === b.numerator * a.denominator;
}

/**
 * floor(size * numerator / denominator), multiplied before dividing so
 * integral results stay exact.
 */
export function applyScaleFactor(size: number, factor: ScaleFactor): number {
  return Math.floor((size * factor.numerator) / factor.denominator);
}

export function scaleFactorToNumber(factor: ScaleFactor): number {
  return factor.numerator / factor.denominator;
}

/**
 * Parses manifest notation: "2", "1/2".
 */
export function parseScaleFactor(text: string): ScaleFactor {
  const match = /^\s*(\d+)\s*(?:\/\s*(\d+)\s*)?$/.exec(text);
  if (!match) {
    throw new PipelineConfigError(`Invalid scale factor "${text}"`);
  }

  const factor: ScaleFactor = {
    numerator: Number(match[1]),
    denominator: match[2] === undefined ? 1 : Number(match[2]),
  };
  if (!isValidScaleFactor(factor)) {
    throw new PipelineConfigError(`Invalid scale factor "${text}"`);
  }
  return reduceScaleFactor(factor);
}

export function formatScaleFactor(factor: ScaleFactor): string {
  return factor.denominator === 1
    ? `${factor.numerator}`
    : `${factor.numerator}/${factor.denominator}`;
}
