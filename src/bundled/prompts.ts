export const taskPromptTemplate = `# {{TASK_NAME}}

{{TASK_BODY}}

---

## Working agreement

You are working in an isolated git worktree at \`{{WORKTREE_DIR}}\` on branch
\`{{BRANCH}}\`. Other agents work on other tasks in sibling worktrees; stay
inside this one.

Report progress by rewriting the JSON file \`{{STATUS_FILE}}\`. Keep every
existing key and update these as you go:

- \`status\`: one of \`pending\`, \`in_progress\`, \`blocked\`, \`completed\`, \`failed\`
- \`phase\`: a short label for what you are doing now
- \`progress_percent\`: an integer from 0 to 100
- \`last_update\`: the current time as an ISO-8601 timestamp
- \`blocker\`: what you need from a human when \`status\` is \`blocked\`, else null
- \`notes\`: anything a reviewer should know
- \`pr_url\`: the pull request URL once you have opened one

Write the whole file at once (write a temporary file, then rename it) so a
reader never sees a partial document. When the work is done, commit it, push
\`{{BRANCH}}\`, open a pull request, and set \`status\` to \`completed\` with
\`progress_percent\` 100.
`;

export const exampleTodo = `# Tasks

## Example task
Describe what should be done here. Everything under a "## " heading,
up to the next heading, is handed to the agent as the task description.
`;
