import * as fs from 'fs-extra';
import * as path from 'path';
import { PROJECT_ROOT } from '../config/RcaConfig';
import { ErrorKind, RcaError } from '../errors';

/**
 * Redactor - secrets and PII removal for evidence text.
 *
 * Runs on every collected file before its text reaches a prompt, so
 * credentials and personal data found in logs never leave the machine.
 * Default rules live in config/redaction-rules.json; callers may append
 * their own.
 *
 * @example
 * const redactor = new Redactor();
 * const result = redactor.process("User: user@example.com");
 * // result.redacted === "User: [REDACTED-EMAIL]"
 * // result.check.appliedRules === ["Email"]
 */
export interface RedactionRule {
    name: string;
    pattern: string; // regex source, applied globally
    replacement: string;
}

export interface RedactionResult {
    redacted: string;
    check: { hasChanges: boolean; appliedRules: string[] };
}

const DEFAULT_RULES_PATH = path.join(PROJECT_ROOT, 'config', 'redaction-rules.json');

let defaultRules: RedactionRule[] | null = null;

function isRule(value: unknown): value is RedactionRule {
    return typeof value === 'object' && value !== null
        && typeof Reflect.get(value, 'name') === 'string'
        && typeof Reflect.get(value, 'pattern') === 'string'
        && typeof Reflect.get(value, 'replacement') === 'string';
}

export function loadDefaultRules(): RedactionRule[] {
    if (!defaultRules) {
        const content: unknown = fs.readJSONSync(DEFAULT_RULES_PATH);
        if (!Array.isArray(content) || !content.every(isRule)) {
            throw new RcaError(ErrorKind.ConfigurationError, `Redaction rules in ${DEFAULT_RULES_PATH} are malformed`);
        }
        defaultRules = content;
    }
    return defaultRules;
}

export class Redactor {
    private rules: { name: string; regex: RegExp; replacement: string }[];

    constructor(customRules: RedactionRule[] = []) {
        this.rules = [...loadDefaultRules(), ...customRules].map((rule) => ({
            name: rule.name,
            regex: new RegExp(rule.pattern, 'g'),
            replacement: rule.replacement
        }));
    }

    process(content: string): RedactionResult {
        let current = content;
        const applied: string[] = [];

        for (const rule of this.rules) {
            const next = current.replace(rule.regex, rule.replacement);
            if (next !== current) {
                current = next;
                applied.push(rule.name);
            }
        }

        return {
            redacted: current,
            check: {
                hasChanges: applied.length > 0,
                appliedRules: applied
            }
        };
    }
}
