import eslint from "@eslint/js";
import tseslint from "typescript-eslint";
import type { Rule } from "eslint";
import type { ConfigArray } from "typescript-eslint";

// Custom rule: enforce test file naming convention
const testFileNamingRule: Rule.RuleModule = {
	meta: {
		type: "problem",
		docs: {
			description: "Enforce that test files end with .unit.test.ts",
			recommended: true,
		},
		messages: {
			invalidTestFileName:
				"Test file must end with .unit.test.ts. Found: '{{actual}}'",
		},
	},
	create(context) {
		const filename = context.filename;

		return {
			Program() {
				if (!/\.test\.ts$|\.spec\.ts$/.exec(filename)) {
					return;
				}
				if (filename.endsWith(".unit.test.ts")) {
					return;
				}
				context.report({
					loc: { column: 0, line: 1 },
					messageId: "invalidTestFileName",
					data: { actual: filename },
				});
			},
		};
	},
};

export default [
	{
		ignores: ["dist/**", "node_modules/**", "coverage/**", "*.config.ts"],
	},

	{
		files: ["**/*.test.ts", "**/*.spec.ts"],
		plugins: {
			metair: { rules: { "test-file-naming": testFileNamingRule } },
		},
		rules: {
			"metair/test-file-naming": "error",
		},
	},

	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// TypeScript (strict type-aware) - only for src/**/*.ts files
	...tseslint.configs.strictTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	...tseslint.configs.stylisticTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	{
		files: ["src/**/*.ts"],
		linterOptions: {
			noInlineConfig: true,
		},
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			"@typescript-eslint/no-unused-vars": ["error", { argsIgnorePattern: "^_" }],
			"@typescript-eslint/no-explicit-any": "error",
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{ allowNumber: true },
			],
			"@typescript-eslint/restrict-plus-operands": [
				"error",
				{ allowNumberAndString: true },
			],
			// Forbid all type assertions (use proper type guards instead)
			"@typescript-eslint/no-non-null-assertion": "error",
			"@typescript-eslint/consistent-type-assertions": ["error", { assertionStyle: "never" }],
			// Visitor and transformer hooks are meant to be overridden
			"@typescript-eslint/class-methods-use-this": "off",
			indent: ["error", "tab", { SwitchCase: 0 }],
			quotes: ["error", "double", { avoidEscape: true }],
			"max-lines": ["warn", { max: 400, skipBlankLines: true, skipComments: true }],
			"max-params": ["warn", { max: 4 }],
			"max-depth": ["warn", { max: 4 }],
		},
	},

	// Node constructors and dispatchers are long flat switches
	{
		files: ["src/ira/nodes.ts", "src/irb/nodes.ts", "src/ira/visitor.ts", "src/irb/visitor.ts", "src/irb/transformation.ts"],
		rules: {
			"max-lines": "off",
		},
	},

	...tseslint.configs.recommended.map((config) => ({
		...config,
		files: ["test/**/*.ts"],
	})),
	{
		files: ["test/**/*.ts"],
		rules: {
			"@typescript-eslint/no-unused-vars": "error",
			"no-case-declarations": "off",
			indent: ["error", "tab", { SwitchCase: 0 }],
			quotes: ["error", "double", { avoidEscape: true }],
		},
	},
] satisfies ConfigArray;
