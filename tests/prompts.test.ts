import { fillPrompt, prompts } from "../src/prompts";

describe("Prompts", () => {
  test("should load every template from disk", () => {
    expect(prompts.webAnalyst).toContain("{{QUESTION}}");
    expect(prompts.entityExtractor).toContain("{{TEXT}}");
    expect(prompts.visualizer).toContain("{{TEXT}}");
    expect(prompts.answer.length).toBeGreaterThan(0);
  });

  test("should replace known placeholders and keep unknown ones", () => {
    expect(fillPrompt("Q: {{QUESTION}} / {{OTHER}}", { QUESTION: "best CRM?" })).toBe("Q: best CRM? / {{OTHER}}");
  });
});
