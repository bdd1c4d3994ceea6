export const INSTRUCTIONS = `
# Blog Posts

You have read access to a blog whose posts live as markdown files in a git
repository. The index is kept up to date in the background: new commits show
up after the next poll without any action from you.

- **Read:** \`get_post\` (one post with rendered HTML), \`list_posts\` (browse/filter, newest first)
- **Browse:** \`list_taxonomy\` (categories, tags, monthly archive, pinned posts)
- **Status:** \`index_status\` (snapshot version, source commit, sync state)

## Notes

- Posts are addressed by name: the file path inside the language folder
  without \`.md\` (e.g. \`my-post\`, \`guides/setup\`).
- Every tool takes an optional \`language\`; the first configured language is
  the default.
- \`list_posts\` hides unpublished posts unless \`include_unpublished\` is
  true. \`get_post\` always returns them, marked \`published: false\`.
- If a post you expect is missing, check \`index_status\`: the source may be
  unreachable, in which case the last good snapshot is still being served.
`;
