// ============================================
// Agent Loop Tests: termination, tool dispatch, fallback
// ============================================

import { describe, it, expect } from "vitest";
import { FALLBACK_ANSWER, findAnswer, runAgent, type RunAgentInput } from "../src/agent/loop.js";
import { NoTerminationError, ReasonerError, RequestAbortedError } from "../src/lib/errors.js";
import type { Conversation, Decision, Message, Reasoner } from "../src/agent/types.js";
import { createScriptedReasoner, createStubTool } from "./helpers.js";

function userTurn(content: string): Conversation {
  return [{ role: "user", content }];
}

function toolCall(id: string, name: string, argument: string): Decision {
  return { type: "tool_calls", content: "", calls: [{ id, name, argument }] };
}

function baseInput(overrides: Partial<RunAgentInput> & Pick<RunAgentInput, "reasoner">): RunAgentInput {
  return {
    conversation: userTurn("How many leave days do I get?"),
    tools: [],
    maxRounds: 6,
    toolTimeoutMs: 1000,
    thinkTimeoutMs: 1000,
    requestId: "test-req",
    ...overrides,
  };
}

const never = <T>() => new Promise<T>(() => undefined);

describe("runAgent", () => {
  it("answers after one retrieval round", async () => {
    const reasoner = createScriptedReasoner([
      toolCall("call_1", "retrieve", "leave days"),
      { type: "final", content: "You get 25 days of leave." },
    ]);
    const retrieve = createStubTool("retrieve", async (q) => `Source: leave.txt\n---\nresult for ${q}`);
    const conversation = userTurn("How many leave days do I get?");

    const result = await runAgent(baseInput({ reasoner, tools: [retrieve], conversation }));

    expect(result).toEqual({ answer: "You get 25 days of leave.", state: "DONE", rounds: 2 });
    expect(conversation).toEqual([
      { role: "user", content: "How many leave days do I get?" },
      { role: "assistant", content: "", toolCalls: [{ id: "call_1", name: "retrieve", argument: "leave days" }] },
      { role: "tool", content: "Source: leave.txt\n---\nresult for leave days", toolCallId: "call_1", name: "retrieve" },
      { role: "assistant", content: "You get 25 days of leave." },
    ]);
    expect(reasoner.calls).toEqual([
      { messageCount: 1, tools: ["retrieve"] },
      { messageCount: 3, tools: ["retrieve"] },
    ]);
  });

  it("answers directly without tools", async () => {
    const reasoner = createScriptedReasoner([{ type: "final", content: "Hello!" }]);

    const result = await runAgent(baseInput({ reasoner }));

    expect(result).toEqual({ answer: "Hello!", state: "DONE", rounds: 1 });
  });

  it("treats a tool_calls decision with no calls as final", async () => {
    const reasoner = createScriptedReasoner([{ type: "tool_calls", content: "Done already.", calls: [] }]);

    const result = await runAgent(baseInput({ reasoner }));

    expect(result).toEqual({ answer: "Done already.", state: "DONE", rounds: 1 });
  });

  it("stops after exactly maxRounds when the reasoner never finishes", async () => {
    const reasoner = createScriptedReasoner([toolCall("call_x", "retrieve", "again")]);
    const retrieve = createStubTool("retrieve", async () => "more context");
    const conversation = userTurn("loop forever");

    const result = await runAgent(baseInput({ reasoner, tools: [retrieve], conversation, maxRounds: 3 }));

    expect(reasoner.calls).toHaveLength(3);
    expect(result.answer).toBe(FALLBACK_ANSWER);
    expect(result.state).toBe("FAILED");
    expect(result.rounds).toBe(3);
    expect(result.error).toBeInstanceOf(NoTerminationError);
    expect(result.error?.message).toBe("Agent did not produce a final answer within 3 rounds");
    expect(conversation).toHaveLength(7);
  });

  it("gives up after maxRounds when the reasoner keeps calling a missing tool", async () => {
    const reasoner = createScriptedReasoner([toolCall("call_g", "ghost", "boo")]);
    const conversation = userTurn("anything");

    const result = await runAgent(baseInput({ reasoner, conversation, maxRounds: 4 }));

    expect(reasoner.calls).toHaveLength(4);
    expect(result).toMatchObject({ answer: FALLBACK_ANSWER, state: "FAILED", rounds: 4 });
    expect(conversation.filter((m) => m.role === "tool")).toHaveLength(4);
    expect(conversation[2]?.content).toBe('Error: Unknown tool "ghost". Available tools: none.');
  });

  it("reports an unknown tool back to the reasoner and keeps going", async () => {
    const reasoner = createScriptedReasoner([
      toolCall("call_1", "calculator", "2+2"),
      { type: "final", content: "Recovered." },
    ]);
    const conversation = userTurn("what is 2+2");
    const retrieve = createStubTool("retrieve", async () => "unused");

    const result = await runAgent(baseInput({ reasoner, tools: [retrieve], conversation }));

    expect(result.answer).toBe("Recovered.");
    expect(conversation[2]).toEqual({
      role: "tool",
      content: 'Error: Unknown tool "calculator". Available tools: retrieve.',
      toolCallId: "call_1",
      name: "calculator",
    });
  });

  it("turns a tool exception into an error tool message", async () => {
    const reasoner = createScriptedReasoner([
      toolCall("call_1", "retrieve", "leave"),
      { type: "final", content: "Sorry, the documents are unavailable." },
    ]);
    const retrieve = createStubTool("retrieve", async () => {
      throw new Error("index offline");
    });
    const conversation = userTurn("leave?");

    const result = await runAgent(baseInput({ reasoner, tools: [retrieve], conversation }));

    expect(result.state).toBe("DONE");
    expect(conversation[2]?.content).toBe('Error: Tool "retrieve" failed: index offline');
  });

  it("times out a hanging tool", async () => {
    const reasoner = createScriptedReasoner([
      toolCall("call_1", "slow", "anything"),
      { type: "final", content: "Gave up on the slow tool." },
    ]);
    const slow = createStubTool("slow", () => never<string>());
    const conversation = userTurn("hurry");

    const result = await runAgent(baseInput({ reasoner, tools: [slow], conversation, toolTimeoutMs: 20 }));

    expect(result.answer).toBe("Gave up on the slow tool.");
    expect(conversation[2]?.content).toBe('Error: Tool "slow" timed out after 20ms');
  });

  it("runs tool calls concurrently and appends results in request order", async () => {
    const events: string[] = [];
    const slowTool = createStubTool("slow", async (q) => {
      events.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 30));
      events.push("slow:end");
      return `slow ${q}`;
    });
    const fastTool = createStubTool("fast", async (q) => {
      events.push("fast:start");
      events.push("fast:end");
      return `fast ${q}`;
    });
    const reasoner = createScriptedReasoner([
      {
        type: "tool_calls",
        content: "",
        calls: [
          { id: "a", name: "slow", argument: "one" },
          { id: "b", name: "fast", argument: "two" },
        ],
      },
      { type: "final", content: "Both done." },
    ]);
    const conversation = userTurn("both");

    await runAgent(baseInput({ reasoner, tools: [slowTool, fastTool], conversation }));

    expect(events.indexOf("fast:start")).toBeLessThan(events.indexOf("slow:end"));
    expect(conversation.slice(2, 4).map((m) => [m.toolCallId, m.content])).toEqual([
      ["a", "slow one"],
      ["b", "fast two"],
    ]);
  });

  it("returns the fallback when the final answer is blank", async () => {
    const reasoner = createScriptedReasoner([{ type: "final", content: "   " }]);

    const result = await runAgent(baseInput({ reasoner }));

    expect(result).toEqual({ answer: FALLBACK_ANSWER, state: "DONE", rounds: 1 });
  });

  it("does not answer with an assistant reply from an earlier turn", async () => {
    const conversation: Conversation = [
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello, how can I help?" },
      { role: "user", content: "What is the leave policy?" },
    ];
    const reasoner = createScriptedReasoner([{ type: "final", content: "" }]);

    const result = await runAgent(baseInput({ reasoner, conversation }));

    expect(result).toEqual({ answer: FALLBACK_ANSWER, state: "DONE", rounds: 1 });
  });

  it("answers with text sent alongside this request's tool calls when the final reply is blank", async () => {
    const reasoner = createScriptedReasoner([
      { type: "tool_calls", content: "Checking the handbook.", calls: [{ id: "c1", name: "retrieve", argument: "leave" }] },
      { type: "final", content: "  " },
    ]);
    const retrieve = createStubTool("retrieve", async () => "Source: leave.txt\n---\n25 days");

    const result = await runAgent(baseInput({ reasoner, tools: [retrieve] }));

    expect(result.answer).toBe("Checking the handbook.");
  });

  it("leaves earlier conversation entries untouched", async () => {
    const history: Message[] = [
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello, how can I help?" },
      { role: "user", content: "Remote work rules?" },
    ];
    const conversation = history.map((m) => ({ ...m }));
    const reasoner = createScriptedReasoner([{ type: "final", content: "Two days a week." }]);

    await runAgent(baseInput({ reasoner, conversation }));

    expect(conversation.slice(0, 3)).toEqual(history);
    expect(conversation).toHaveLength(4);
  });

  it("wraps reasoner failures in ReasonerError", async () => {
    const reasoner: Reasoner = {
      decide: async () => {
        throw new Error("quota exceeded");
      },
    };

    const attempt = runAgent(baseInput({ reasoner }));

    await expect(attempt).rejects.toBeInstanceOf(ReasonerError);
    await expect(attempt).rejects.toThrow("quota exceeded");
  });

  it("retries a reasoner step that timed out", async () => {
    let attempts = 0;
    const reasoner: Reasoner = {
      decide: () => {
        attempts += 1;
        return attempts === 1 ? never<Decision>() : Promise.resolve<Decision>({ type: "final", content: "Second try." });
      },
    };

    const result = await runAgent(baseInput({ reasoner, thinkTimeoutMs: 20, thinkRetries: 1 }));

    expect(attempts).toBe(2);
    expect(result).toEqual({ answer: "Second try.", state: "DONE", rounds: 1 });
  });

  it("fails once reasoner timeouts exhaust the retries", async () => {
    const reasoner: Reasoner = { decide: () => never<Decision>() };

    await expect(runAgent(baseInput({ reasoner, thinkTimeoutMs: 10, thinkRetries: 1 }))).rejects.toThrow(
      "Reasoner timed out after 10ms"
    );
  });

  it("refuses to start on an aborted request", async () => {
    const reasoner = createScriptedReasoner([{ type: "final", content: "unused" }]);
    const controller = new AbortController();
    controller.abort();

    await expect(runAgent(baseInput({ reasoner, signal: controller.signal }))).rejects.toBeInstanceOf(
      RequestAbortedError
    );
    expect(reasoner.calls).toHaveLength(0);
  });
});

describe("findAnswer", () => {
  it("picks the last assistant message with text", () => {
    const conversation: Message[] = [
      { role: "user", content: "q" },
      { role: "assistant", content: "first" },
      { role: "tool", content: "data", toolCallId: "1", name: "retrieve" },
      { role: "assistant", content: "" },
    ];

    expect(findAnswer(conversation)).toBe("first");
  });

  it("ignores messages before the start index", () => {
    const conversation: Message[] = [
      { role: "assistant", content: "old answer" },
      { role: "user", content: "q" },
      { role: "assistant", content: "" },
    ];

    expect(findAnswer(conversation, 1)).toBeUndefined();
  });

  it("returns undefined when no assistant message has text", () => {
    expect(findAnswer([{ role: "user", content: "q" }])).toBeUndefined();
  });
});
