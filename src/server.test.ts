import { afterEach, describe, expect, it, vi } from "vitest";
import { BrowseError } from "./browse";
import { type JsonReply, parseId, replyWithError } from "./server";

function recordingReply() {
  const sent: { status?: number; body?: unknown } = {};
  const reply: JsonReply = {
    status(code) {
      sent.status = code;
      return {
        json(body) {
          sent.body = body;
          return undefined;
        },
      };
    },
  };
  return { reply, sent };
}

describe("replyWithError", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the status a browse error carries", () => {
    const { reply, sent } = recordingReply();
    replyWithError(reply, new BrowseError(404, "Student 7 not found"));
    expect(sent).toEqual({ status: 404, body: { error: "Student 7 not found" } });
  });

  it("turns anything else into a 500", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { reply, sent } = recordingReply();
    replyWithError(reply, new Error("disk I/O error"));
    expect(sent).toEqual({ status: 500, body: { error: "disk I/O error" } });
  });
});

describe("parseId", () => {
  it("accepts positive integers only", () => {
    expect(parseId("12")).toBe(12);
    expect(() => parseId("abc")).toThrow('Invalid id "abc"');
    expect(() => parseId("0")).toThrow(BrowseError);
    expect(() => parseId("1.5")).toThrow(BrowseError);
  });
});
