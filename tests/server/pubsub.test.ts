import { afterEach, describe, expect, it, vi } from "vitest";

import { ALL_TASKS_TOPIC, PubSub, taskTopic } from "../../server/realtime/pubsub.js";

describe("pubsub", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("delivers messages to topic subscribers until they unsubscribe", () => {
    const pubsub = new PubSub<string>();
    const received: string[] = [];
    const unsubscribe = pubsub.subscribe(taskTopic("a"), (message) => received.push(`${message.topic}:${message.data}`));

    expect(pubsub.publish(taskTopic("a"), "one")).toBe(1);
    expect(pubsub.publish(taskTopic("b"), "ignored")).toBe(0);
    unsubscribe();
    expect(pubsub.publish(taskTopic("a"), "two")).toBe(0);

    expect(received).toEqual(["task:a:one"]);
    expect(pubsub.subscriberCount(taskTopic("a"))).toBe(0);
  });

  it("drops listeners that throw and keeps delivering to the rest", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const pubsub = new PubSub<number>();
    const received: number[] = [];
    pubsub.subscribe(ALL_TASKS_TOPIC, () => {
      throw new Error("listener failed");
    });
    pubsub.subscribe(ALL_TASKS_TOPIC, (message) => received.push(message.data));

    expect(pubsub.publish(ALL_TASKS_TOPIC, 1)).toBe(1);
    expect(pubsub.publish(ALL_TASKS_TOPIC, 2)).toBe(1);

    expect(received).toEqual([1, 2]);
    expect(pubsub.subscriberCount(ALL_TASKS_TOPIC)).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
