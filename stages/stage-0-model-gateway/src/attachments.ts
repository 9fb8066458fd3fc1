/**
 * Data URI helpers for image attachments.
 * Loading bytes from disk or the network is the caller's business; these only encode.
 */

import type { ContentPart, Message } from "./types.js";

const DATA_URI_REGEX = /^data:([a-z]+\/[a-z0-9.+-]+);base64,([A-Za-z0-9+/=\s]*)$/i;

export interface DecodedDataUri {
  mimeType: string;
  base64: string;
}

export function toDataUri(bytes: Uint8Array, mimeType: string): string {
  return `data:${mimeType};base64,${Buffer.from(bytes).toString("base64")}`;
}

export function parseDataUri(uri: string): DecodedDataUri {
  const match = uri.match(DATA_URI_REGEX);
  if (!match) {
    throw new Error(`Not a base64 data URI: ${uri.slice(0, 40)}`);
  }
  return { mimeType: match[1], base64: match[2].replace(/\s+/g, "") };
}

/** Flatten message content to text; image parts are dropped. */
export function contentToText(content: Message["content"]): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .filter((p): p is Extract<ContentPart, { type: "text" }> => p.type === "text")
    .map((p) => p.text)
    .join("\n");
}

export function countAttachments(messages: Message[]): number {
  let count = 0;
  for (const message of messages) {
    if (typeof message.content !== "string") {
      count += message.content.filter((p) => p.type === "image").length;
    }
  }
  return count;
}
