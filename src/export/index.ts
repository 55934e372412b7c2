export { renderPostMarkdown, writePostFile } from './post-file.js';
