/**
 * agent.ts
 *
 * Purpose:
 * - Tool-calling chat loop over OpenAI chat completions. The model sees the registry's
 *   tool schema, asks for tools, and gets every result back as a `tool` message until
 *   it answers in plain text.
 *
 * Important:
 * - The agent is **stateful** per instance: `chat()` appends to an in-memory history,
 *   `reset()` clears it. Nothing is persisted.
 * - A turn only lands in history once it completes; a failed completion call leaves the
 *   previous history untouched.
 *
 * Flow:
 * 1) system prompt + history + user message → completion (tool_choice "auto")
 * 2) tool_calls? → parse arguments, run all calls of the round concurrently through the
 *    registry, append the results as `tool` messages, go back to 1
 * 3) plain reply → answer (or a fixed apology when empty)
 * 4) more than `maxToolRounds` rounds → fixed fallback answer
 */

import type OpenAI from "openai";
import { describeError } from "../errors";
import { logEvent } from "../logger";
import { fail, type Envelope } from "../types";
import type { ToolRegistry } from "./registry";
import { SYSTEM_PROMPT } from "./systemPrompt";
import { serializeToolResult } from "./utils";

type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;
type ToolCall = OpenAI.Chat.ChatCompletionMessageToolCall;

/** The one model call the agent needs; swapped for a fake in tests. */
export type CompleteFn = (
  body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
) => Promise<OpenAI.Chat.ChatCompletion>;

export type ToolTrace = { name: string; arguments: unknown; success: boolean };
export type AgentReply = { answer: string; tools: ToolTrace[] };

export type MapAgentOptions = {
  complete: CompleteFn;
  model: string;
  registry: ToolRegistry;
  systemPrompt?: string;
  maxToolRounds?: number;
};

export const EMPTY_REPLY = "I apologize, but I couldn't generate a response.";
export const TOO_MANY_ROUNDS_REPLY =
  "I couldn't finish answering within the allowed number of tool calls. Please try a narrower question.";

export function openAICompletion(client: OpenAI): CompleteFn {
  return (body) => client.chat.completions.create(body);
}

type ParsedArguments = { ok: true; value: unknown } | { ok: false; raw: string };

function parseArguments(call: ToolCall): ParsedArguments {
  const raw = call.function.arguments;
  if (!raw.trim()) return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    logEvent("warn", "tool_arguments_unparseable", { tool: call.function.name, error: describeError(err) });
    return { ok: false, raw };
  }
}

export function createMapAgent({
  complete,
  model,
  registry,
  systemPrompt = SYSTEM_PROMPT,
  maxToolRounds = 8,
}: MapAgentOptions) {
  const tools = registry.toOpenAITools();
  let history: ChatMessage[] = [];

  async function runToolCall(call: ToolCall): Promise<{ trace: ToolTrace; message: ChatMessage }> {
    const name = call.function.name;
    const args = parseArguments(call);
    const result: Envelope<unknown> = args.ok
      ? await registry.executeTool(name, args.value)
      : fail(`Invalid arguments for ${name}: not valid JSON`);

    return {
      trace: { name, arguments: args.ok ? args.value : args.raw, success: result.success },
      message: { role: "tool", tool_call_id: call.id, content: serializeToolResult(result) },
    };
  }

  async function chat(message: string): Promise<AgentReply> {
    const turn: ChatMessage[] = [...history, { role: "user", content: message }];
    const trace: ToolTrace[] = [];

    for (let round = 0; ; round++) {
      const completion = await complete({
        model,
        temperature: 0.2,
        messages: [{ role: "system", content: systemPrompt }, ...turn],
        tools,
        tool_choice: "auto",
      });
      const msg = completion.choices[0]?.message;
      const calls = msg?.tool_calls ?? [];

      // No tool calls → this is the answer
      if (!calls.length) {
        const answer = msg?.content?.trim() || EMPTY_REPLY;
        turn.push({ role: "assistant", content: answer });
        history = turn;
        return { answer, tools: trace };
      }

      if (round >= maxToolRounds) {
        logEvent("warn", "agent_round_limit", { rounds: round, pending: calls.map((c) => c.function.name) });
        turn.push({ role: "assistant", content: TOO_MANY_ROUNDS_REPLY });
        history = turn;
        return { answer: TOO_MANY_ROUNDS_REPLY, tools: trace };
      }

      logEvent("info", "agent_tool_round", { round: round + 1, tools: calls.map((c) => c.function.name) });
      turn.push({ role: "assistant", content: msg?.content ?? null, tool_calls: calls });

      const results = await Promise.all(calls.map(runToolCall));
      for (const r of results) {
        trace.push(r.trace);
        turn.push(r.message);
      }
    }
  }

  return {
    chat,
    reset() {
      history = [];
    },
    /** Copy of the conversation so far (without the system prompt). */
    history(): ChatMessage[] {
      return [...history];
    },
  };
}

export type MapAgent = ReturnType<typeof createMapAgent>;
