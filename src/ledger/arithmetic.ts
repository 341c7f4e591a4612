import type { Value } from '../interfaces';
import { U128_MAX } from './codec';

export function checkedAdd(a: Value, b: Value): Value | undefined {
  const sum = a + b;
  return sum > U128_MAX ? undefined : sum;
}

export function checkedSub(a: Value, b: Value): Value | undefined {
  return b > a ? undefined : a - b;
}
