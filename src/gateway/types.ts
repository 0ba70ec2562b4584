// ---------------------------------------------------------------------------
// Messaging gateway contract
// ---------------------------------------------------------------------------
// The protection core never talks to the chat platform directly. Everything
// it needs goes through this interface; every method may throw and callers
// are expected to catch at the call site.
// ---------------------------------------------------------------------------

/** Observable attributes of an account at join time. */
export interface AccountProfile {
  id: number;
  isBot: boolean;
  isPremium: boolean;
  username: string | null;
  firstName: string;
  lastName: string | null;
  languageCode: string | null;
}

export interface OutgoingMessage {
  text: string;
  /** Rendered as one-tap answer buttons where the platform supports them. */
  choices?: string[];
}

export type MemberStatus = "creator" | "administrator" | "member" | "restricted" | "left" | "kicked";

export interface MemberInfo {
  status: MemberStatus;
  account: AccountProfile;
}

export interface MessagingGateway {
  /** Remove (kick, not permanently ban) an account from a community. */
  removeMember(communityId: string, userId: number): Promise<void>;
  /** Send a message and return its platform message id. */
  sendMessage(chatId: string, message: OutgoingMessage): Promise<number>;
  deleteMessage(chatId: string, messageId: number): Promise<void>;
  getProfilePhotoCount(userId: number): Promise<number>;
  getMember(communityId: string, userId: number): Promise<MemberInfo>;
  /** Acknowledge a button press so the client stops waiting. */
  acknowledge(interactionId: string, text: string): Promise<void>;
}

export class GatewayError extends Error {
  readonly method: string;
  readonly code: number | null;

  constructor(method: string, message: string, code: number | null = null) {
    super(`${method}: ${message}`);
    this.method = method;
    this.code = code;
    this.name = "GatewayError";
  }
}
