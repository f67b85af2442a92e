const URL_CREDENTIALS_RE = /\b([a-z][a-z0-9+.-]*:\/\/)[^\s/@]+@/gi;

/** Masks `user[:password]@` in every URL found in the text. */
export const redactCredentials = (text: string) =>
	text.replace(URL_CREDENTIALS_RE, "$1***@");

export const redactRepoUrl = (repo: string) => redactCredentials(repo);
