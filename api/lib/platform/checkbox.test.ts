import { describe, it, expect } from "vitest";
import { countUncheckedBoxes, tickAllCheckboxes } from "./checkbox.js";

describe("tickAllCheckboxes", () => {
  it("ticks every unchecked box", () => {
    expect(tickAllCheckboxes("- [ ] one\n- [x] two\n- [ ] three")).toEqual({
      text: "- [x] one\n- [x] two\n- [x] three",
      count: 2,
    });
  });

  it("leaves text without unchecked boxes alone", () => {
    expect(tickAllCheckboxes("- [x] done")).toEqual({ text: "- [x] done", count: 0 });
    expect(countUncheckedBoxes("")).toBe(0);
  });
});
