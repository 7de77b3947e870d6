import assert from "node:assert/strict";
import { test } from "node:test";
import type OpenAI from "openai";
import {
  EMPTY_REPLY,
  TOO_MANY_ROUNDS_REPLY,
  createMapAgent,
  type CompleteFn,
} from "../src/agent/agent";
import { SYSTEM_PROMPT } from "../src/agent/systemPrompt";
import { serializeToolResult } from "../src/agent/utils";
import { loadConfig } from "../src/config";
import { createGateway } from "../src/gateway";
import { toTrip } from "../src/tools/trips";
import { fail, ok } from "../src/types";
import { stubClient } from "./helpers";

type Body = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
type ToolCall = OpenAI.Chat.ChatCompletionMessageToolCall;

const TRIPS = [
  toTrip({ origin: { label: "Home" }, destination: { label: "Office" }, timestamp: "2025-03-03T08:00", mode: "driving", duration_minutes: 20, distance_km: 4 }),
];

function gateway() {
  const { client, calls } = stubClient(() => new Error("no request expected"));
  const config = loadConfig({ API_RATE_LIMIT_DELAY: "0" }, "/srv/app");
  return { gateway: createGateway(config, { client, trips: TRIPS }), calls };
}

function reply(content: string | null, toolCalls?: ToolCall[]): OpenAI.Chat.ChatCompletion {
  return {
    id: "cmpl-test",
    object: "chat.completion",
    created: 0,
    model: "test-model",
    choices: [
      {
        index: 0,
        finish_reason: toolCalls ? "tool_calls" : "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null, tool_calls: toolCalls },
      },
    ],
  };
}

function call(id: string, name: string, args: string): ToolCall {
  return { id, type: "function", function: { name, arguments: args } };
}

/** Fake model: hands out the scripted replies in order and records every request. */
function scripted(...replies: Array<OpenAI.Chat.ChatCompletion | Error>) {
  const bodies: Body[] = [];
  const complete: CompleteFn = async (body) => {
    bodies.push(body);
    const next = replies.shift();
    if (!next) throw new Error("no scripted reply left");
    if (next instanceof Error) throw next;
    return next;
  };
  return { complete, bodies };
}

test("answers directly when the model needs no tools", async () => {
  const { gateway: gw } = gateway();
  const model = scripted(reply("Hello there"));
  const agent = createMapAgent({ complete: model.complete, model: "test-model", registry: gw.registry });

  const res = await agent.chat("Hi");

  assert.deepEqual(res, { answer: "Hello there", tools: [] });
  const body = model.bodies[0];
  assert.equal(body?.model, "test-model");
  assert.equal(body?.temperature, 0.2);
  assert.equal(body?.tool_choice, "auto");
  assert.equal(body?.tools?.length, 11);
  assert.deepEqual(body?.messages, [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: "Hi" },
  ]);
  assert.deepEqual(agent.history(), [
    { role: "user", content: "Hi" },
    { role: "assistant", content: "Hello there" },
  ]);
});

test("runs requested tools and feeds the results back", async () => {
  const { gateway: gw } = gateway();
  const request = call("call_1", "get_typical_route", JSON.stringify({ origin_label: "Home", destination_label: "Office" }));
  const model = scripted(reply(null, [request]), reply("Usually 20 minutes by car."));
  const agent = createMapAgent({ complete: model.complete, model: "test-model", registry: gw.registry });

  const res = await agent.chat("How long is my commute?");

  assert.deepEqual(res, {
    answer: "Usually 20 minutes by car.",
    tools: [
      { name: "get_typical_route", arguments: { origin_label: "Home", destination_label: "Office" }, success: true },
    ],
  });
  const expected = await gw.history.getTypicalRoute("Home", "Office");
  assert.deepEqual(model.bodies[1]?.messages.slice(2), [
    { role: "assistant", content: null, tool_calls: [request] },
    { role: "tool", tool_call_id: "call_1", content: serializeToolResult(expected) },
  ]);
});

test("bad tool requests go back to the model as failures", async () => {
  const { gateway: gw, calls } = gateway();
  const model = scripted(
    reply(null, [call("call_1", "do_nothing", ""), call("call_2", "geocode", "{oops")]),
    reply("Sorry, I could not look that up.")
  );
  const agent = createMapAgent({ complete: model.complete, model: "test-model", registry: gw.registry });

  const res = await agent.chat("Where is Beirut?");

  assert.deepEqual(res.tools, [
    { name: "do_nothing", arguments: {}, success: false },
    { name: "geocode", arguments: "{oops", success: false },
  ]);
  assert.deepEqual(model.bodies[1]?.messages.slice(3), [
    { role: "tool", tool_call_id: "call_1", content: JSON.stringify(fail("unknown tool: do_nothing")) },
    {
      role: "tool",
      tool_call_id: "call_2",
      content: JSON.stringify(fail("Invalid arguments for geocode: not valid JSON")),
    },
  ]);
  assert.equal(calls.length, 0);
});

test("stops after the tool round limit with a fallback answer", async () => {
  const { gateway: gw } = gateway();
  const again = () => reply(null, [call("call_x", "summarize_travel_stats", "{}")]);
  const model = scripted(again(), again(), again(), again());
  const agent = createMapAgent({ complete: model.complete, model: "test-model", registry: gw.registry, maxToolRounds: 2 });

  const res = await agent.chat("Tell me everything");

  assert.equal(res.answer, TOO_MANY_ROUNDS_REPLY);
  assert.equal(res.tools.length, 2);
  assert.equal(model.bodies.length, 3);
});

test("an empty reply becomes an apology", async () => {
  const { gateway: gw } = gateway();
  const model = scripted(reply("   "));
  const agent = createMapAgent({ complete: model.complete, model: "test-model", registry: gw.registry });
  assert.equal((await agent.chat("Hi")).answer, EMPTY_REPLY);
});

test("keeps the conversation until reset", async () => {
  const { gateway: gw } = gateway();
  const model = scripted(reply("First"), reply("Second"), new Error("model unavailable"));
  const agent = createMapAgent({
    complete: model.complete,
    model: "test-model",
    registry: gw.registry,
    systemPrompt: "Be brief.",
  });

  await agent.chat("One");
  await agent.chat("Two");

  assert.deepEqual(model.bodies[1]?.messages, [
    { role: "system", content: "Be brief." },
    { role: "user", content: "One" },
    { role: "assistant", content: "First" },
    { role: "user", content: "Two" },
  ]);

  // A failed turn is not recorded.
  await assert.rejects(agent.chat("Three"), /model unavailable/);
  assert.equal(agent.history().length, 4);

  agent.reset();
  assert.deepEqual(agent.history(), []);
});

test("tool results are cut to the size limit", () => {
  const big = ok({ text: "x".repeat(20_000) });
  assert.equal(serializeToolResult(big).length, 15_000);
  assert.equal(serializeToolResult(big, 100).length, 100);
  assert.equal(serializeToolResult(fail("nope")), '{"success":false,"error":"nope"}');
});
