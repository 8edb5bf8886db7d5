import os from "node:os";
import path from "node:path";

/**
 * Cut text to `max` code points and mark the cut with an ellipsis.
 * The marker is always appended, matching how notification previews are stored.
 */
export function previewText(text: string, max = 50): string {
	return `${Array.from(text).slice(0, max).join("")}...`;
}

export const CONFIG_DIR =
	process.env.FORUM_CHANNEL_DATA_DIR || path.join(os.homedir(), ".forum-channel");
