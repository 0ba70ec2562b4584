import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TelegramGateway } from "../../../src/gateway/telegram.js";
import { GatewayError } from "../../../src/gateway/types.js";
import { createMockLogger } from "../../helpers/mock-logger.js";
import type { MockLogger } from "../../helpers/mock-logger.js";

const API_URL = "http://telegram.test";
const TOKEN = "123456:test-secret";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

let fetchMock: ReturnType<typeof vi.fn>;
let logger: MockLogger;
let gateway: TelegramGateway;

function lastCall(): { url: string; body: unknown } {
  const call = fetchMock.mock.calls.at(-1);
  if (!call) throw new Error("fetch was not called");
  const init: RequestInit = call[1];
  return { url: String(call[0]), body: JSON.parse(String(init.body)) };
}

beforeEach(() => {
  fetchMock = vi.fn();
  vi.stubGlobal("fetch", fetchMock);
  logger = createMockLogger();
  gateway = new TelegramGateway({ token: TOKEN, apiUrl: API_URL, timeoutMs: 1000 }, logger as never);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("TelegramGateway", () => {
  it("sends a message with answer buttons in rows of two", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true, result: { message_id: 77, date: 0 } }));

    const messageId = await gateway.sendMessage("-1001", { text: "2 + 2 = ?", choices: ["3", "4", "5"] });

    expect(messageId).toBe(77);
    expect(lastCall()).toEqual({
      url: `${API_URL}/bot${TOKEN}/sendMessage`,
      body: {
        chat_id: "-1001",
        text: "2 + 2 = ?",
        reply_markup: {
          inline_keyboard: [
            [
              { text: "3", callback_data: "verify:3" },
              { text: "4", callback_data: "verify:4" },
            ],
            [{ text: "5", callback_data: "verify:5" }],
          ],
        },
      },
    });
  });

  it("sends plain text without a keyboard", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true, result: { message_id: 78 } }));

    await gateway.sendMessage("42", { text: "hello" });

    expect(lastCall().body).toEqual({ chat_id: "42", text: "hello" });
  });

  it("kicks a member with ban then unban", async () => {
    fetchMock.mockImplementation(() => Promise.resolve(jsonResponse({ ok: true, result: true })));

    await gateway.removeMember("-1001", 42);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(`${API_URL}/bot${TOKEN}/banChatMember`);
    expect(lastCall()).toEqual({
      url: `${API_URL}/bot${TOKEN}/unbanChatMember`,
      body: { chat_id: "-1001", user_id: 42, only_if_banned: true },
    });
  });

  it("turns an API error into a GatewayError", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ ok: false, error_code: 400, description: "Bad Request: not enough rights" }, 400),
    );

    const error = await gateway.deleteMessage("-1001", 5).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toMatchObject({
      method: "deleteMessage",
      code: 400,
      message: "deleteMessage: Bad Request: not enough rights",
    });
  });

  it("turns a network failure into a GatewayError", async () => {
    fetchMock.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

    await expect(gateway.getProfilePhotoCount(42)).rejects.toMatchObject({
      method: "getUserProfilePhotos",
      code: null,
      message: "getUserProfilePhotos: connect ECONNREFUSED",
    });
  });

  it("rejects a body that is not an API envelope", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>Bad gateway</html>", { status: 502 }));

    await expect(gateway.acknowledge("cb-1", "ok")).rejects.toMatchObject({
      code: 502,
      message: "answerCallbackQuery: Unexpected response (HTTP 502)",
    });
  });

  it("rejects a result of the wrong shape", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true, result: { photos: [] } }));

    await expect(gateway.getProfilePhotoCount(42)).rejects.toThrow("Unexpected result shape");
    expect(logger.warn).toHaveBeenCalledWith(
      { method: "getUserProfilePhotos" },
      "Telegram returned an unexpected result shape",
    );
  });

  it("reads the profile photo count", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true, result: { total_count: 3, photos: [] } }));

    await expect(gateway.getProfilePhotoCount(42)).resolves.toBe(3);
    expect(lastCall().body).toEqual({ user_id: 42, limit: 1 });
  });

  it("maps a chat member to an account profile", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        ok: true,
        result: {
          status: "member",
          user: { id: 42, is_bot: false, first_name: "Anna", username: "anna_k", language_code: "de" },
        },
      }),
    );

    await expect(gateway.getMember("-1001", 42)).resolves.toEqual({
      status: "member",
      account: {
        id: 42,
        isBot: false,
        isPremium: false,
        username: "anna_k",
        firstName: "Anna",
        lastName: null,
        languageCode: "de",
      },
    });
  });
});
