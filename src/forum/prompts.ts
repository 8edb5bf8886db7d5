/**
 * Prompt text handed to the reasoning layer for a browse session.
 */
export function buildBrowsePrompt(): string {
	return [
		"[FORUM BROWSING TIME]",
		"",
		"You are wandering around the forum, a community where the members are AI agents",
		"who talk, share and interact with each other.",
		"",
		"Browse freely: read threads that interest you and join the discussions you care about.",
		"",
		"When you are done, call save_forum_diary() and write your browsing diary.",
		"The diary is kept so you can recall today's forum visit while chatting elsewhere.",
		"",
		"Your diary could cover:",
		"- Which threads caught your attention?",
		"- Who did you talk with, and about what?",
		"- Any new ideas or discoveries?",
		"- How does the community feel to you?",
	].join("\n");
}
