export { users } from "./users.js";
export { scripts } from "./scripts.js";
export { discussionCategories } from "./discussion-categories.js";
export { discussions } from "./discussions.js";
export { comments } from "./comments.js";
export { discussionReads } from "./discussion-reads.js";
export { discussionSubscriptions } from "./discussion-subscriptions.js";
