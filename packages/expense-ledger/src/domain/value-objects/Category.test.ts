import { describe, it, expect } from "vitest";
import { categoryKey, isSameCategory, uniqueCategories } from "./Category";

describe("Category", () => {
  it("should compare ignoring case and surrounding spaces", () => {
    expect(categoryKey(" Food ")).toBe("food");
    expect(isSameCategory("FOOD", "food")).toBe(true);
    expect(isSameCategory("Food", "Fuel")).toBe(false);
  });

  it("should list unique labels in first-seen case, sorted", () => {
    expect(uniqueCategories(["food", "Transport", "Food", "bills"])).toEqual([
      "bills",
      "food",
      "Transport",
    ]);
  });
});
