export interface PubSubMessage<T> {
  topic: string;
  data: T;
  timestamp: string;
}

export type PubSubListener<T> = (message: PubSubMessage<T>) => void;

export class PubSub<T> {
  private readonly listeners = new Map<string, Set<PubSubListener<T>>>();

  subscribe(topic: string, listener: PubSubListener<T>): () => void {
    let topicListeners = this.listeners.get(topic);
    if (!topicListeners) {
      topicListeners = new Set();
      this.listeners.set(topic, topicListeners);
    }
    topicListeners.add(listener);
    return () => this.unsubscribe(topic, listener);
  }

  unsubscribe(topic: string, listener: PubSubListener<T>): void {
    const topicListeners = this.listeners.get(topic);
    if (!topicListeners) {
      return;
    }
    topicListeners.delete(listener);
    if (topicListeners.size === 0) {
      this.listeners.delete(topic);
    }
  }

  /** Returns the number of listeners that received the message. */
  publish(topic: string, data: T): number {
    const topicListeners = this.listeners.get(topic);
    if (!topicListeners) {
      return 0;
    }

    const message: PubSubMessage<T> = { topic, data, timestamp: new Date().toISOString() };
    let delivered = 0;
    for (const listener of [...topicListeners]) {
      try {
        listener(message);
        delivered += 1;
      } catch (error) {
        console.warn(`[pubsub] Dropping listener on "${topic}" after it threw.`, error);
        this.unsubscribe(topic, listener);
      }
    }
    return delivered;
  }

  subscriberCount(topic: string): number {
    return this.listeners.get(topic)?.size ?? 0;
  }
}

export function taskTopic(taskId: string): string {
  return `task:${taskId}`;
}

export const ALL_TASKS_TOPIC = "tasks";
