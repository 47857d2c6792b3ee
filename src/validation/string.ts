export interface StringRules {
    maxLength?: number;
    minLength?: number;
    allowedChars?: string; // every character must come from this set
    forbiddenChars?: string; // no character may come from this set
}

/**
 * Validates string values like account names, token contracts and token ids
 * @param value Value to validate
 * @param rules Length and character constraints
 * @returns True if the value is a string meeting every rule
 */
const validateString = (value: unknown, rules: StringRules = {}): value is string => {
    if (typeof value !== 'string')
        return false;

    const maxLength = rules.maxLength ?? Number.MAX_SAFE_INTEGER;
    const minLength = rules.minLength ?? 0;
    if (value.length > maxLength || value.length < minLength)
        return false;

    for (const char of value) {
        if (rules.allowedChars !== undefined && !rules.allowedChars.includes(char))
            return false;
        if (rules.forbiddenChars !== undefined && rules.forbiddenChars.includes(char))
            return false;
    }
    return true;
};

export default validateString;
