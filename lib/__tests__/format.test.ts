import { fmtKg, fmtLongDate, toDateString } from "../format";

describe("fmtKg", () => {
  test("formats with one decimal by default", () => {
    expect(fmtKg(72)).toBe("72.0 kg");
    expect(fmtKg(72.25, 2)).toBe("72.25 kg");
  });

  test("returns N/A for missing values", () => {
    expect(fmtKg(null)).toBe("N/A");
    expect(fmtKg(undefined)).toBe("N/A");
    expect(fmtKg(NaN)).toBe("N/A");
  });
});

describe("dates", () => {
  test("toDateString reads the UTC calendar day", () => {
    expect(toDateString(new Date("2026-10-19T23:30:00Z"))).toBe("2026-10-19");
  });

  test("fmtLongDate pads the day", () => {
    expect(fmtLongDate(new Date("2026-10-09T12:00:00Z"))).toBe("October 09, 2026");
  });
});
