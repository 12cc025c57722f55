import { describe, expect, it } from "vitest";
import { matchOutOfScope, matchSmallTalk } from "../../pipeline/patterns";

describe("matchOutOfScope", () => {
  it("rejects questions that are only an expression", () => {
    expect(matchOutOfScope("What is 2+2?")?.category).toBe("arithmetic");
    expect(matchOutOfScope("calculate (3 + 4) * 2")?.category).toBe("arithmetic");
    expect(matchOutOfScope("What's 12 x 4?")?.category).toBe("arithmetic");
  });

  it("leaves numbers inside ordinary questions alone", () => {
    expect(matchOutOfScope("What does he say about being available 24/7?")).toBeNull();
    expect(matchOutOfScope("What was discussed in episodes 3 - 5?")).toBeNull();
    expect(matchOutOfScope("What happened on 12/05/2021?")).toBeNull();
    expect(matchOutOfScope("How does she calculate her weekly deep work hours?")).toBeNull();
  });

  it("recognizes other off-topic requests", () => {
    expect(matchOutOfScope("Will it rain tomorrow?")?.category).toBe("weather");
    expect(matchOutOfScope("Write a python function to sort a list")?.category).toBe("coding");
  });
});

describe("matchSmallTalk", () => {
  it("matches greetings but not questions that start like one", () => {
    expect(matchSmallTalk("Hi")?.intent).toBe("greeting");
    expect(matchSmallTalk("Hi, what is deep work?")).toBeNull();
  });
});
