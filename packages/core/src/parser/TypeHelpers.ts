// A trailing `$` marks a string variable; every other name is numeric.
export const STRING_SUFFIX = "$";

export function isStringIdentifier(name: string): boolean {
    return name.length > 0 && name.endsWith(STRING_SUFFIX);
}

// Keywords that close a nested block.
export const BLOCK_TERMINATORS: readonly string[] = [
    "end",
    "else",
    "elseif",
    "next",
    "loop",
];
