import {
  compareNamesCaseInsensitive,
  sortByName,
} from "../../../../src/shared/utils/sortUtils";

describe("sortUtils", () => {
  test("should compare names ignoring case", () => {
    expect(compareNamesCaseInsensitive("apple", "Banana")).toBe(-1);
    expect(compareNamesCaseInsensitive("Zoo", "alpha")).toBe(1);
  });

  test("should break case-only ties by code unit order", () => {
    expect(compareNamesCaseInsensitive("B", "b")).toBe(-1);
    expect(compareNamesCaseInsensitive("b", "B")).toBe(1);
    expect(compareNamesCaseInsensitive("b", "b")).toBe(0);
  });

  test("should order by code point beyond the basic multilingual plane", () => {
    // U+1F600 is stored as the surrogate pair D83D DE00, below U+FF5E in UTF-16
    expect(compareNamesCaseInsensitive("\u{1F600}.txt", "\uFF5E.txt")).toBe(1);
    expect(compareNamesCaseInsensitive("\uFF5E.txt", "\u{1F600}.txt")).toBe(-1);
  });

  test("should sort without mutating the input", () => {
    const items = [{ name: "b" }, { name: "B" }, { name: "a" }, { name: "C" }];

    const sorted = sortByName(items);

    expect(sorted.map((item) => item.name)).toEqual(["a", "B", "b", "C"]);
    expect(items.map((item) => item.name)).toEqual(["b", "B", "a", "C"]);
  });
});
