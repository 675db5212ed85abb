/**
 * @fileoverview Detailed help text for evidence-algebra CLI commands
 */

const HELP_TEXT = {
  main: `
evidence-algebra CLI

USAGE:
    evidence-algebra <command> [options]

COMMANDS:
    validate <file>     Check an evidence document
    combine <file>      Combine all sources of a document with one rule
    measure <file>      Belief, plausibility and commonality of a hypothesis
    discount <file>     Discount every source by a reliability factor
    generate            Generate a random evidence document
    help [command]      Show help for a command

GLOBAL OPTIONS:
    --json              Machine-readable output on stdout (logs silenced)
    --verbose           Log informational messages to stderr
    -v, --version       Print the version
`,

  validate: `
evidence-algebra validate - Check an evidence document

USAGE:
    evidence-algebra validate <file> [--json] [--out <path>]

DESCRIPTION:
    Checks that the frame is non-empty without duplicates, that there is at
    least one source, that focal sets use the {A,B} form with frame elements
    only, that masses lie in [0,1] and that each source sums to 1 (±0.001).
`,

  combine: `
evidence-algebra combine - Combine all sources of a document

USAGE:
    evidence-algebra combine <file> [--rule <name>] [--json] [--out <path>]

OPTIONS:
    --rule <name>       conjunctive | dempster | disjunctive | yager | dubois-prade |
                        zhang | pcr5 | pcr6 | cautious | bold  (default: dempster)

DESCRIPTION:
    Binary rules are applied as a left fold in document order; pcr6 combines
    all sources at once.

EXAMPLES:
    evidence-algebra combine sensors.json --rule yager
    evidence-algebra combine sensors.json --rule pcr6 --json
`,

  measure: `
evidence-algebra measure - Measures of one hypothesis

USAGE:
    evidence-algebra measure <file> --hypothesis "{A,B}" [--source <id> | --rule <name>] [--json]

DESCRIPTION:
    Reports Bel, Pl and Q of the hypothesis for one source, or for the
    combination of all sources (default rule: dempster).
`,

  discount: `
evidence-algebra discount - Discount every source

USAGE:
    evidence-algebra discount <file> --alpha <reliability> [--out <path>]

DESCRIPTION:
    Applies classical discounting with reliability alpha in [0,1] to every
    source and emits the resulting document.
`,

  generate: `
evidence-algebra generate - Generate a random evidence document

USAGE:
    evidence-algebra generate --elements A,B,C [--sources N] [--seed N] [--include-empty] [--out <path>]

DESCRIPTION:
    Each source gets one to three singletons, up to two composite sets and,
    with --include-empty, occasionally mass on {}. --seed makes the output
    reproducible.
`,

  help: `
evidence-algebra help - Show help

USAGE:
    evidence-algebra help [command]
`,
};

type HelpTopic = keyof typeof HELP_TEXT;

const EXIT_CODES_SECTION = `
EXIT CODES:
    0      Success
    1      Internal failure
    2      Invalid arguments
    3      File not found
    4      Invalid document or input
    5      Evidence error (frame mismatch, total conflict, dogmatic input,
           invalid reliability or partition)

    In --json mode, inspect the "code" field for the exact machine-readable reason.
`;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.keys(HELP_TEXT).includes(value);
}

function renderHelp(command?: string): string {
  const withExitCodes = (text: string): string => `${text.trimEnd()}\n${EXIT_CODES_SECTION}`;

  if (command && isHelpTopic(command)) {
    return withExitCodes(HELP_TEXT[command]);
  }
  if (command) {
    return `Unknown command: ${command}\n${withExitCodes(HELP_TEXT.main)}`;
  }
  return withExitCodes(HELP_TEXT.main);
}

export function showHelp(command?: string): void {
  console.log(renderHelp(command));
}

export function getCommandHelp(command: string): string {
  return renderHelp(command);
}
