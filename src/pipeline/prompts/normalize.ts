// Prompt used to rewrite a video description into one "TIMESTAMP LABEL" entry per line
export const NORMALIZE_PROMPT = `
You clean up video descriptions so that a script can read their chapter markers.

Rewrite the description below following these rules:
- Find every line that carries a timestamp (H:MM:SS or M:SS) and a short description of the moment.
- Put the timestamp at the very start of the line, followed by exactly one space and the description.
- Drop brackets around the timestamp and any dashes, pipes or extra spaces between the timestamp and the description.
- If one line lists several timestamps, split it into one line per timestamp.
- Leave every line without a timestamp exactly as it is, in its original position.
- Do NOT invent, merge or reorder timestamps.
- Return ONLY the rewritten description, without code fences or commentary.

Example input:
   0:15 - Kick-off
(01:23:45) GOAL!!! What a shot!
Check out our sponsor

Example output:
0:15 Kick-off
01:23:45 GOAL!!! What a shot!
Check out our sponsor
`;

export function buildNormalizePrompt(description: string): string {
  return `${NORMALIZE_PROMPT}
--- DESCRIPTION START ---
${description}
--- DESCRIPTION END ---
`;
}
