import { describe, it, expect } from "vitest";
import { renderEach, renderTemplate } from "../src/domain/idl/templateEngine.js";

describe("Template Engine", () => {
  it("should render simple string templates", () => {
    expect(renderTemplate("Hello {{name}}!", { name: "John" })).toBe("Hello John!");
  });

  it("should resolve nested paths", () => {
    const context = { user: { name: "Alice", profile: { age: 25 } } };
    expect(renderTemplate("{{user.name}} is {{ user.profile.age }}", context)).toBe("Alice is 25");
  });

  it("should render missing and null values as empty strings", () => {
    expect(renderTemplate("[{{missing}}][{{nothing}}]", { nothing: null })).toBe("[][]");
  });

  it("should not evaluate expressions", () => {
    expect(renderTemplate("{{a + b}}", { a: 1, b: 2 })).toBe("");
  });

  it("should render one template per item", () => {
    const items = [{ n: 1 }, { n: 2 }, { n: 3 }];
    expect(renderEach("<{{n}}>", items)).toBe("<1><2><3>");
    expect(renderEach("{{n}}", items, ", ")).toBe("1, 2, 3");
  });
});
