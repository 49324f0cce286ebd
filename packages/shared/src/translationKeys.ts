const KEY_CHAR_PATTERN = /^[A-Za-z0-9_.:/-]+$/;
const MAX_KEY_LENGTH = 160;

export type InvalidKeyReason =
  | "empty"
  | "too_long"
  | "boundary_dot"
  | "consecutive_dots"
  | "empty_segment"
  | "reserved_segment"
  | "unsupported_characters";

export const getInvalidTranslationKeyReason = (
  value: string,
): InvalidKeyReason | null => {
  const key = value.trim();

  if (!key) {
    return "empty";
  }

  if (key.length > MAX_KEY_LENGTH) {
    return "too_long";
  }

  if (key.startsWith(".") || key.endsWith(".")) {
    return "boundary_dot";
  }

  if (key.includes("..")) {
    return "consecutive_dots";
  }

  if (key.split(".").some((segment) => segment.trim() === "")) {
    return "empty_segment";
  }

  if (!KEY_CHAR_PATTERN.test(key)) {
    return "unsupported_characters";
  }

  if (key.split(".").includes("__proto__")) {
    return "reserved_segment";
  }

  return null;
};

export const describeInvalidKeyReason = (reason: InvalidKeyReason) => {
  switch (reason) {
    case "empty":
      return "Key is empty.";
    case "too_long":
      return `Key is longer than ${MAX_KEY_LENGTH} characters.`;
    case "boundary_dot":
      return "Key cannot start or end with a dot.";
    case "consecutive_dots":
      return "Key cannot contain consecutive dots.";
    case "empty_segment":
      return "Key contains an empty segment.";
    case "reserved_segment":
      return "Key cannot use __proto__ as a segment.";
    case "unsupported_characters":
      return "Key contains unsupported characters.";
  }
};
