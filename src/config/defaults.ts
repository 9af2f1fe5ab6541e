/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and for any field it leaves out.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  style: 'ansi',
  dispatch: 'first-rewrite',
  parameter_aliases: {},
};

/**
 * Written by `errlens config init`
 */
export const CONFIG_TEMPLATE = `# errlens configuration
# Location: ~/.errlens/config.toml

# "ansi" renders the label bold red, "plain" prints bare text.
# NO_COLOR or ERRLENS_STYLE in the environment take precedence.
style = "${DEFAULT_CONFIG.style}"

# "first-rewrite": a recognized error whose details cannot be extracted
# falls through to the next error kind.
# "first-match": the first recognized kind ends the search either way.
dispatch = "${DEFAULT_CONFIG.dispatch}"

# Map validator field names to the flag users type.
[parameter_aliases]
# storage_account_name = "--account-name"
`;
