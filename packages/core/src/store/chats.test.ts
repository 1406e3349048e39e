import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ChatAmbiguousError, ChatNotFoundError } from "../infra/errors.js";
import { createFixtureStore, type FixtureStore } from "../testing/viber-fixture.js";
import { openStore, type MessageStore } from "./database.js";
import { listChats, resolveChat } from "./chats.js";

describe("chats", () => {
  let fixture: FixtureStore;
  let store: MessageStore;

  beforeEach(() => {
    fixture = createFixtureStore()
      .addContact(2, "Alice")
      .addContact(3, null, "bob.client")
      .addContact(4, "Carol")
      .addContact(5, "Alice")
      .addChat(10, [2])
      .addChat(11, [4, 3], "Weekend trip")
      .addChat(12, [4])
      .addChat(13, [5]);
    store = openStore(fixture.done());
  });

  afterEach(() => {
    store.close();
    fixture.cleanup();
  });

  describe("listChats", () => {
    it("lists every chat with sorted participants, excluding the owner", () => {
      expect(listChats(store)).toEqual([
        { id: 10, name: "Alice", participants: ["Alice"] },
        { id: 11, name: "Weekend trip", participants: ["bob.client", "Carol"] },
        { id: 12, name: "Carol", participants: ["Carol"] },
        { id: 13, name: "Alice", participants: ["Alice"] },
      ]);
    });
  });

  describe("resolveChat", () => {
    it("finds a chat by id", () => {
      expect(resolveChat(store, { by: "id", id: 12 })).toEqual({
        id: 12,
        name: "Carol",
        participants: ["Carol"],
      });
    });

    it("fails for an unknown id", () => {
      expect(() => resolveChat(store, { by: "id", id: 99 })).toThrow(ChatNotFoundError);
      expect(() => resolveChat(store, { by: "id", id: 99 })).toThrow("No chat with id 99");
    });

    it("matches names case-insensitively after trimming", () => {
      expect(resolveChat(store, { by: "name", name: "  weekend TRIP " }).id).toBe(11);
    });

    it("fails for an unknown name", () => {
      expect(() => resolveChat(store, { by: "name", name: "Dave" })).toThrow(
        'No chat named "Dave"',
      );
    });

    it("fails when a name matches more than one chat", () => {
      let error: unknown;
      try {
        resolveChat(store, { by: "name", name: "Alice" });
      } catch (err) {
        error = err;
      }
      expect(error).toBeInstanceOf(ChatAmbiguousError);
      expect(error).toMatchObject({
        chatIds: [10, 13],
        message: 'Chat name "Alice" matches 2 chats (ids 10, 13); use --chat-id',
      });
    });
  });
});
