import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFixtureStore, MINUTE, type FixtureStore } from "../testing/viber-fixture.js";
import { openStore, type MessageStore } from "./database.js";
import { fetchMessages } from "./messages.js";

const T0 = Date.UTC(2024, 2, 1, 9, 0, 0);

describe("fetchMessages", () => {
  let fixture: FixtureStore;
  let store: MessageStore;

  beforeEach(() => {
    fixture = createFixtureStore()
      .addContact(2, "Alice")
      .addContact(3, "Bob")
      .addChat(10, [2])
      .addChat(11, [3])
      // inserted out of order on purpose
      .addMessage({ chatId: 10, contactId: 2, timestamp: T0 + 40 * MINUTE, body: "third" })
      .addMessage({ chatId: 10, contactId: 1, timestamp: T0, body: "first" })
      .addMessage({ chatId: 11, contactId: 3, timestamp: T0 + MINUTE, body: "other chat" })
      .addMessage({ chatId: 10, contactId: 2, timestamp: T0 + 5 * MINUTE, body: "second" })
      .addMessage({ chatId: 10, contactId: 2, timestamp: T0 + 45 * MINUTE, body: null, type: 2 });
    store = openStore(fixture.done());
  });

  afterEach(() => {
    store.close();
    fixture.cleanup();
  });

  it("returns only the chat's messages in ascending order", () => {
    const messages = fetchMessages(store, 10);
    expect(messages.map((m) => m.body)).toEqual(["first", "second", "third", ""]);
    for (let i = 1; i < messages.length; i++) {
      expect(messages[i]!.timestamp).toBeGreaterThanOrEqual(messages[i - 1]!.timestamp);
    }
  });

  it("maps columns onto the message record", () => {
    const [first] = fetchMessages(store, 10);
    expect(first).toEqual({
      id: 2,
      chatId: 10,
      timestamp: T0,
      sender: "Me",
      type: 1,
      body: "first",
      subject: null,
      info: null,
      duration: null,
      stickerId: null,
    });
  });

  it("treats a null body as an empty string", () => {
    const messages = fetchMessages(store, 10);
    expect(messages[3]).toMatchObject({ type: 2, body: "" });
  });

  it("includes the start bound and excludes the end bound", () => {
    const messages = fetchMessages(store, 10, {
      start: T0 + 5 * MINUTE,
      end: T0 + 45 * MINUTE,
    });
    expect(messages.map((m) => m.body)).toEqual(["second", "third"]);
    for (const m of messages) {
      expect(m.timestamp).toBeGreaterThanOrEqual(T0 + 5 * MINUTE);
      expect(m.timestamp).toBeLessThan(T0 + 45 * MINUTE);
    }
  });

  it("accepts a single open-ended bound", () => {
    expect(fetchMessages(store, 10, { start: T0 + 40 * MINUTE })).toHaveLength(2);
    expect(fetchMessages(store, 10, { end: T0 + MINUTE })).toHaveLength(1);
  });

  it("returns an empty list when nothing matches", () => {
    expect(fetchMessages(store, 10, { start: T0 + 60 * MINUTE })).toEqual([]);
    expect(fetchMessages(store, 42)).toEqual([]);
  });

  it("orders messages with equal timestamps by event id", () => {
    fixture.cleanup();
    store.close();
    fixture = createFixtureStore()
      .addContact(2, "Alice")
      .addChat(10, [2])
      .addMessage({ chatId: 10, contactId: 2, timestamp: T0, body: "a" })
      .addMessage({ chatId: 10, contactId: 1, timestamp: T0, body: "b" });
    store = openStore(fixture.done());

    expect(fetchMessages(store, 10).map((m) => m.body)).toEqual(["a", "b"]);
  });
});
