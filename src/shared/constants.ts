/** Application constants shared across modules */

export const APP_NAME = 'vpush';

/** Display name used in the launcher entry and the shell header */
export const APP_TITLE = 'Version & Push';

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

export const DEFAULT_BRANCH = 'main';

export const DEFAULT_COMMIT_LIMIT = 20;

export const DEFAULT_MANIFEST_FILE = 'package.json';

export const DEFAULT_SKIP_DIRS = ['node_modules', '.git'];

export const DEFAULT_CREDENTIAL_SERVICE = 'vpush';

/** Secret store account names */
export const SECRET_ACCOUNT_USER = 'github_user';
export const SECRET_ACCOUNT_TOKEN = 'github_token';
