import type { ForumSettings } from "./config/config.js";

/**
 * Resolve the streaming credential.
 *
 * Token loading priority:
 * 1. Config file (`forum.token`)
 * 2. FORUM_TOKEN env var, for container deployments
 *
 * Returns null when neither is set; the adapter refuses to start in that case.
 */
export function resolveForumToken(
	settings: Pick<ForumSettings, "token">,
	env: NodeJS.ProcessEnv = process.env,
): string | null {
	const fromConfig = settings.token?.trim();
	if (fromConfig) return fromConfig;

	const fromEnv = env.FORUM_TOKEN?.trim();
	return fromEnv || null;
}
