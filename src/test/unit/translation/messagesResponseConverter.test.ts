import { expect } from "chai";
import { describe, it } from "mocha";

import {
  deriveStopReason,
  generateMessageId,
  MessagesResponseConverter,
  parseToolArguments,
} from "../../../translation/converters/messagesResponseConverter.js";
import { MalformedToolArgumentsError } from "../../../translation/errors.js";

import type { NativeCompletionResult, NativeToolCall } from "../../../types/index.js";

const usage = { promptTokens: 10, completionTokens: 5 };

const toolCall = (id: string, name: string, args: string): NativeToolCall => ({
  id,
  type: "function",
  function: { name, arguments: args },
});

describe("MessagesResponseConverter", () => {
  const converter = new MessagesResponseConverter({
    modelLabel: "groq/test-model",
    generateId: () => "msg_test",
  });

  it("wraps text in a message envelope", () => {
    const result: NativeCompletionResult = { text: "Hello", finishReason: "stop", usage };

    expect(converter.convert(result)).to.deep.equal({
      id: "msg_test",
      type: "message",
      model: "groq/test-model",
      role: "assistant",
      content: [{ type: "text", text: "Hello" }],
      stop_reason: "end_turn",
      stop_sequence: null,
      usage: { input_tokens: 10, output_tokens: 5 },
    });
  });

  it("appends tool_use blocks after the text block", () => {
    const result: NativeCompletionResult = {
      text: "Checking.",
      toolCalls: [
        toolCall("call_1", "get_weather", '{"city":"Paris"}'),
        toolCall("call_2", "get_time", "{}"),
      ],
      finishReason: "tool_calls",
      usage,
    };

    const response = converter.convert(result);
    expect(response.content).to.deep.equal([
      { type: "text", text: "Checking." },
      { type: "tool_use", id: "call_1", name: "get_weather", input: { city: "Paris" } },
      { type: "tool_use", id: "call_2", name: "get_time", input: {} },
    ]);
    expect(response.stop_reason).to.equal("tool_use");
  });

  it("reports tool_use even when the backend hit the length limit", () => {
    const result: NativeCompletionResult = {
      toolCalls: [toolCall("call_1", "lookup", '{"x":1}')],
      finishReason: "length",
      usage,
    };

    expect(converter.convert(result).stop_reason).to.equal("tool_use");
  });

  it("maps a length finish without tool calls to max_tokens", () => {
    expect(deriveStopReason({ text: "partial", finishReason: "length", usage })).to.equal("max_tokens");
    expect(deriveStopReason({ text: "x", toolCalls: [], finishReason: "other", usage })).to.equal("end_turn");
  });

  it("always returns at least one content block", () => {
    expect(converter.convert({ text: null, finishReason: "stop", usage }).content).to.deep.equal([
      { type: "text", text: "" },
    ]);
    expect(converter.convert({ text: "", toolCalls: [], finishReason: "stop", usage }).content).to.deep.equal([
      { type: "text", text: "" },
    ]);
  });

  it("rejects arguments that are not JSON", () => {
    const result: NativeCompletionResult = {
      toolCalls: [toolCall("call_9", "lookup", "{not json")],
      finishReason: "tool_calls",
      usage,
    };

    expect(() => converter.convert(result)).to.throw(MalformedToolArgumentsError);
  });

  it("rejects arguments that parse to something other than an object", () => {
    try {
      parseToolArguments(toolCall("call_3", "lookup", "[1,2]"));
      expect.fail("expected MalformedToolArgumentsError");
    } catch (error: unknown) {
      expect(error).to.be.instanceOf(MalformedToolArgumentsError);
      if (error instanceof MalformedToolArgumentsError) {
        expect(error.toolCallId).to.equal("call_3");
        expect(error.toolName).to.equal("lookup");
        expect(error.rawArguments).to.equal("[1,2]");
        expect(error.message).to.equal(
          "Malformed arguments for tool call call_3 (lookup): arguments must be a JSON object",
        );
      }
    }
  });

  it("round-trips tool arguments through the request side encoding", () => {
    const input = { city: "Paris", units: ["c", "f"], nested: { deep: null } };
    expect(parseToolArguments(toolCall("c", "n", JSON.stringify(input)))).to.deep.equal(input);
  });

  it("keeps integer arguments exact up to the largest safe integer", () => {
    const parsed = parseToolArguments(toolCall("c", "n", `{"order_id":${Number.MAX_SAFE_INTEGER}}`));
    expect(parsed).to.deep.equal({ order_id: 9007199254740991 });
  });

  it("generates msg_ ids with 24 hex characters", () => {
    const id = generateMessageId();
    expect(id).to.match(/^msg_[0-9a-f]{24}$/);
    expect(generateMessageId()).to.not.equal(id);
  });

  it("uses the random id generator by default", () => {
    const defaultConverter = new MessagesResponseConverter({ modelLabel: "groq/test-model" });
    const response = defaultConverter.convert({ text: "hi", finishReason: "stop", usage });
    expect(response.id).to.match(/^msg_[0-9a-f]{24}$/);
  });
});
