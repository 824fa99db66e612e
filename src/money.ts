// Currency arithmetic shared by the valuator and the performance calculator.

/** Round to cents, half away from zero. The scaled amount is first cut to
 *  15 significant digits so that 1.005 rounds as the decimal it was written as,
 *  not as the binary 1.00499999... it is stored as. */
export function round2(n: number): number {
  const cents = Number((Math.abs(n) * 100).toPrecision(15));
  return (Math.sign(n) * Math.round(cents)) / 100;
}

export function sum(values: Iterable<number>): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}
