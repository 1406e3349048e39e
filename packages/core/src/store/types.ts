export interface Chat {
  id: number;
  name: string;
  /** Contact names other than the account owner, sorted. */
  participants: string[];
}

export interface Message {
  id: number;
  chatId: number;
  /** Milliseconds since the Unix epoch, UTC. */
  timestamp: number;
  sender: string;
  type: number;
  body: string;
  subject: string | null;
  /** Raw JSON from the `Messages.Info` column. */
  info: string | null;
  duration: number | null;
  stickerId: number | null;
}

export interface TimeRange {
  /** Inclusive, epoch ms. */
  start?: number;
  /** Exclusive, epoch ms. */
  end?: number;
}

export type ChatSelector =
  | { by: "id"; id: number }
  | { by: "name"; name: string };
