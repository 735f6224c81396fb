import { z } from "zod";
import type { Config } from "../Types/Config/config.ts";
import type { LayoutRule } from "../Types/Converter/index.ts";

// Default config.
const DEFAULT_CONFIG: Config = {
    targetFormat: "range_dispatch",
    outputDir: "./output",
    archivePrefix: "converted",
    externalNamespaces: ["minecraft"],
    ignoredFiles: [],
    layout: [],
};

const folderSchema = z.string().trim().min(1).transform(value => value.replace(/^\/+|\/+$/g, ""));

const layoutRuleSchema: z.ZodType<LayoutRule, z.ZodTypeDef, unknown> = z
    .object({ from: folderSchema, to: folderSchema })
    .refine(rule => rule.from !== rule.to && !rule.to.startsWith(`${rule.from}/`), {
        message: "\"to\" must not equal or sit inside \"from\"",
    });

const configSchema: z.ZodType<Config, z.ZodTypeDef, unknown> = z.object({
    targetFormat: z.enum(["range_dispatch", "select"]),
    outputDir: z.string().min(1),
    archivePrefix: z.string().min(1),
    externalNamespaces: z.array(z.string()),
    ignoredFiles: z.array(z.string()),
    layout: z.array(layoutRuleSchema).superRefine((rules, ctx) => {
        // A folder moved by one rule must not be picked up again by another on the next run.
        rules.forEach((rule, i) => {
            const chained = rules.find(other => rule.to === other.from || rule.to.startsWith(`${other.from}/`));
            if (chained) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "to"], message: `"${rule.to}" is moved again by the rule for "${chained.from}"` });
        });
    }),
});

/**
 * Merge partial overrides over the defaults. Nothing here reads ambient state.
 */
function resolveConfig(overrides: Partial<Config> = {}): Config {
    return { ...DEFAULT_CONFIG, ...overrides };
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export { configSchema, DEFAULT_CONFIG, formatIssues, resolveConfig };
