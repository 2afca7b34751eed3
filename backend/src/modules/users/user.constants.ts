// Username rules shared by the profile form and username allocation, so a
// generated username always passes the form that later edits it.
export const USERNAME_MAX_LENGTH = 150;
export const USERNAME_PATTERN = /^[\w.@+-]+$/;
export const USERNAME_DISALLOWED_CHARS = /[^\w.@+-]/g;
