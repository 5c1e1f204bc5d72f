/** Provider returned nothing for the requested instrument/range; aborts the run. */
export class NoPriceDataError extends Error {
  constructor(
    readonly instrument: string,
    readonly start: string,
    readonly end: string
  ) {
    super(`No price data returned for ${instrument} (${start} → ${end})`);
    this.name = "NoPriceDataError";
  }
}
