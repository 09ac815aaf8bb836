export const escapeRegex = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

// Mongoose casts any 12-character string to an ObjectId, so check the hex form explicitly
export const isObjectIdString = (value: string): boolean =>
  OBJECT_ID_PATTERN.test(value);

const pad = (value: number): string => String(value).padStart(2, "0");

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
