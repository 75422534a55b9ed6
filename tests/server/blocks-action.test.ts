import { beforeEach, describe, expect, it, vi } from "vitest";

import { emailBlock } from "../../server/blocks/action/email.js";
import { slackBlock } from "../../server/blocks/action/slack.js";
import { webhookBlock } from "../../server/blocks/action/webhook.js";
import { validateBlockParameters } from "../../server/blocks/parameters.js";
import type { FetchFn } from "../../server/blocks/types.js";
import { createBlockContext } from "../helpers/blockContext.js";

const resendMock = vi.hoisted(() => {
  const apiKeys: string[] = [];
  return { apiKeys, send: vi.fn() };
});

vi.mock("resend", () => ({
  Resend: class {
    readonly emails = { send: resendMock.send };

    constructor(apiKey: string) {
      resendMock.apiKeys.push(apiKey);
    }
  }
}));

const item = { title: "Widget", description: "A new widget", tags: ["a"] };

describe("email block", () => {
  const parameters = validateBlockParameters(emailBlock, {
    apiKey: "test-secret",
    fromEmail: "Alerts <alerts@example.test>",
    toEmail: "a@example.test, b@example.test",
    subjectTemplate: "New Item: {{title}}",
    bodyTemplate: "<p>{{title}} {{missing}}</p>"
  });

  beforeEach(() => {
    resendMock.apiKeys.length = 0;
  });

  it("sends one email per item through Resend", async () => {
    resendMock.send.mockResolvedValueOnce({ data: { id: "email-1" }, error: null });

    const result = await emailBlock.execute(item, parameters, createBlockContext());

    expect(resendMock.apiKeys).toEqual(["test-secret"]);
    expect(resendMock.send).toHaveBeenCalledWith({
      from: "Alerts <alerts@example.test>",
      to: ["a@example.test", "b@example.test"],
      subject: "New Item: Widget",
      html: "<p>Widget {{missing}}</p>"
    });
    expect(result).toEqual({
      success: true,
      message: "Email sent to a@example.test, b@example.test",
      subject: "New Item: Widget",
      messageId: "email-1",
      item
    });
  });

  it("returns the provider error without throwing", async () => {
    resendMock.send.mockResolvedValueOnce({
      data: null,
      error: { name: "validation_error", message: "Invalid API key" }
    });
    const context = createBlockContext();

    const result = await emailBlock.execute(item, parameters, context);

    expect(result).toEqual({ success: false, error: "Invalid API key", item });
    expect(context.logs).toEqual(["Email to a@example.test, b@example.test failed: Invalid API key"]);
  });

  it("reports thrown send errors", async () => {
    resendMock.send.mockRejectedValueOnce(new Error("socket hang up"));

    const result = await emailBlock.execute(item, parameters, createBlockContext());

    expect(result).toEqual({ success: false, error: "socket hang up", item });
  });

  it("skips items that are not new", async () => {
    const stale = { ...item, isNew: false };

    const result = await emailBlock.execute(stale, parameters, createBlockContext());

    expect(result).toEqual({ success: true, message: "Skipped: item is not new", item: stale });
    expect(resendMock.send).not.toHaveBeenCalled();
  });
});

describe("slack block", () => {
  const parameters = validateBlockParameters(slackBlock, {
    webhookUrl: "https://hooks.slack.example.test/services/T000",
    messageTemplate: "*{{title}}* {{tags}}",
    mentionUsers: "<@U1>, <@U2>"
  });

  it("posts the rendered message with mentions on the first line", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("ok", { status: 200 }));

    const result = await slackBlock.execute(item, parameters, createBlockContext({ fetchFn }));

    expect(result).toEqual({ success: true, message: "Message sent to Slack", statusCode: 200, item });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://hooks.slack.example.test/services/T000");
    expect(JSON.parse(String(init?.body))).toEqual({
      text: '<@U1> <@U2>\n*Widget* [\n  "a"\n]',
      username: "taskchain",
      icon_emoji: ":robot_face:",
      mrkdwn: true
    });
  });

  it("returns an error result for rejected posts", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("no_service", { status: 404 }));

    const result = await slackBlock.execute(item, parameters, createBlockContext({ fetchFn }));

    expect(result).toEqual({
      success: false,
      error: "Failed to send message to Slack: status 404",
      statusCode: 404,
      item
    });
  });

  it("returns an error result when the request fails", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError("fetch failed");
    });

    const result = await slackBlock.execute(item, parameters, createBlockContext({ fetchFn }));

    expect(result).toEqual({ success: false, error: "Failed to send message to Slack: fetch failed", item });
  });

  it("skips items that are not new", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("ok"));
    const stale = { ...item, isNew: false };

    const result = await slackBlock.execute(stale, parameters, createBlockContext({ fetchFn }));

    expect(result).toEqual({ success: true, message: "Skipped: item is not new", item: stale });
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

describe("webhook block", () => {
  const parameters = validateBlockParameters(webhookBlock, {
    webhookUrl: "https://hooks.example.test/in",
    headers: '{"X-Token": "test-secret"}'
  });

  it("posts the item as JSON and reports the response", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("accepted", { status: 202 }));

    const result = await webhookBlock.execute(item, parameters, createBlockContext({ fetchFn }));

    expect(result).toEqual({ statusCode: 202, success: true, response: "accepted", item });
    const [, init] = fetchFn.mock.calls[0];
    expect(init?.headers).toEqual({ "X-Token": "test-secret", "Content-Type": "application/json" });
    expect(init?.body).toBe(JSON.stringify(item));
  });

  it("marks error statuses as unsuccessful", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("nope", { status: 500 }));

    const result = await webhookBlock.execute(item, parameters, createBlockContext({ fetchFn }));

    expect(result).toEqual({ statusCode: 500, success: false, response: "nope", item });
  });

  it("reports network errors without a status code", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new Error("connect ECONNREFUSED");
    });

    const result = await webhookBlock.execute(item, parameters, createBlockContext({ fetchFn }));

    expect(result).toEqual({ statusCode: null, success: false, error: "connect ECONNREFUSED", item });
  });

  it("rethrows when the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new DOMException("The operation was aborted.", "AbortError");
    });

    await expect(
      webhookBlock.execute(item, parameters, createBlockContext({ fetchFn, signal: controller.signal }))
    ).rejects.toThrow("The operation was aborted.");
  });
});
