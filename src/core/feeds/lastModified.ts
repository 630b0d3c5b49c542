/**
 * Remote `last-modified` values are compared as naive wall-clock times: the
 * header's GMT fields are read as if they were local time, and compared with the
 * local file mtime. On hosts not running in UTC this skews the pre-filter by the
 * zone offset. Content hashing stays the authority on change, so a skew can only
 * cost a redundant download or delay a refresh until the next run.
 */
export const toNaiveLocalInstant = (instant: Date): Date =>
  new Date(
    instant.getUTCFullYear(),
    instant.getUTCMonth(),
    instant.getUTCDate(),
    instant.getUTCHours(),
    instant.getUTCMinutes(),
    instant.getUTCSeconds(),
    instant.getUTCMilliseconds()
  );

export const parseLastModifiedHeader = (value: string | null | undefined): Date | undefined => {
  if (value == null || value.trim() === "") return undefined;

  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) return undefined;
  return toNaiveLocalInstant(new Date(parsed));
};

export const isLocalCopyCurrent = (localModifiedAt: Date, remoteModifiedAt: Date): boolean =>
  remoteModifiedAt.getTime() <= localModifiedAt.getTime();
