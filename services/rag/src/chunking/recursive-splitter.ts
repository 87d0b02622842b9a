export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""] as const;

export interface RecursiveSplitOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: readonly string[];
}

function splitOn(text: string, separator: string): string[] {
  const parts = separator === "" ? [...text] : text.split(separator);
  return parts.filter((part) => part !== "");
}

/**
 * Greedily join `splits` with `separator` into pieces of at most `chunkSize`
 * characters, carrying up to `chunkOverlap` characters of trailing splits into
 * the next piece.
 */
function mergeSplits(
  splits: readonly string[],
  separator: string,
  chunkSize: number,
  chunkOverlap: number,
): string[] {
  const sepLen = separator.length;
  const pieces: string[] = [];
  let window: string[] = [];
  let total = 0;

  const emit = () => {
    const piece = window.join(separator).trim();
    if (piece !== "") pieces.push(piece);
  };

  for (const split of splits) {
    const joinCost = window.length > 0 ? sepLen : 0;
    if (total + split.length + joinCost > chunkSize && window.length > 0) {
      emit();
      // Drop leading splits until what remains fits the overlap budget and
      // leaves room for the incoming split.
      while (
        total > chunkOverlap ||
        (total > 0 && total + split.length + (window.length > 0 ? sepLen : 0) > chunkSize)
      ) {
        total -= window[0].length + (window.length > 1 ? sepLen : 0);
        window = window.slice(1);
      }
    }
    window.push(split);
    total += split.length + (window.length > 1 ? sepLen : 0);
  }

  if (window.length > 0) emit();
  return pieces;
}

/**
 * Split `text` into pieces of at most `chunkSize` characters, preferring the
 * earliest separator in the list that occurs in the text and recursing into
 * any split that is still too long with the remaining separators. The empty
 * separator splits by character. Text already within the limit is returned
 * as a single untouched piece.
 */
export function recursiveSplit(text: string, options: RecursiveSplitOptions): string[] {
  const { chunkSize, chunkOverlap, separators = DEFAULT_SEPARATORS } = options;
  if (chunkSize < 1) {
    throw new RangeError(`chunkSize must be positive, got ${chunkSize}`);
  }
  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(`chunkOverlap must be in [0, chunkSize), got ${chunkOverlap}`);
  }
  if (text.length <= chunkSize) {
    return [text];
  }
  return splitText(text, separators, chunkSize, chunkOverlap);
}

function splitText(
  text: string,
  separators: readonly string[],
  chunkSize: number,
  chunkOverlap: number,
): string[] {
  let separator = separators[separators.length - 1] ?? "";
  let remaining: readonly string[] = [];
  for (const [i, candidate] of separators.entries()) {
    if (candidate === "") {
      separator = "";
      break;
    }
    if (text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  const pieces: string[] = [];
  let fitting: string[] = [];

  for (const split of splitOn(text, separator)) {
    if (split.length < chunkSize) {
      fitting.push(split);
      continue;
    }
    if (fitting.length > 0) {
      pieces.push(...mergeSplits(fitting, separator, chunkSize, chunkOverlap));
      fitting = [];
    }
    if (remaining.length === 0) {
      pieces.push(split);
    } else {
      pieces.push(...splitText(split, remaining, chunkSize, chunkOverlap));
    }
  }

  if (fitting.length > 0) {
    pieces.push(...mergeSplits(fitting, separator, chunkSize, chunkOverlap));
  }
  return pieces;
}
