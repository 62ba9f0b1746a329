// One commit per line: short hash, ISO-like author date (`%ai`), author name.
export const GIT_LOG_FORMAT = "%h %ai %an";

export const EMPTY_HISTORY_MARKERS = ["does not have any commits yet", "bad default revision 'head'"];
