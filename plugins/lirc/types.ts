export interface LircReply {
  command: string;
  success: boolean;
  data: string[];
}

export type ReplyCallback = (reply: LircReply) => void

export interface PendingReply {
  command: string;
  resolve: (data: string[]) => void;
  reject: (e: Error) => void;
}
