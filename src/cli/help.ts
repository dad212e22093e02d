/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: evidence-loop [question] [options]

Answers a question from a library of regulatory and technical documents,
citing the documents the answer rests on. When no question is given and the
terminal is interactive, it is asked for.

Options:
  --provider <name>                   Language model provider (anthropic|claude-cli|mock) (default: anthropic)
  --model <model>                     Model name passed to the provider
  --fallback-providers <names>        Comma-separated providers tried when the primary fails
  --judge-advisor                     Consult the model for an advisory verdict after each step
  --search-endpoint <url>             Document index base URL (or EVIDENCE_LOOP_SEARCH_ENDPOINT)
  --corpus <file>                     Search a JSON corpus in memory instead of an endpoint
  --mock-config <file>                Scripted responses for --provider mock
  --max-steps <number>                Maximum steps executed per session (default: 12)
  --max-replans <number>              Maximum replans per session (default: 5)
  --loop-window <number>              Consecutive identical steps treated as a loop (default: 3)
  --relevance-threshold <0-1>         Minimum source relevance (default: 0.5)
  --no-interactive                    Disable interactive prompts; fail instead of asking
  --verbose                           Show stage progress and configuration
  --debug                             Show every logged event
  --quiet                             Only print the answer
  --json                              Print the session outcome as JSON
  -h, --help                          Show this help message
  -v, --version                       Show version number

Exit codes:
  0  answered
  1  unexpected error
  2  usage error
  3  handed to human review
  4  configuration error

Examples:
  evidence-loop "What is the minimum concrete cover for a floor slab?"
  evidence-loop "Minimum cover for a slab" --corpus corpus.json
  evidence-loop "Design load for the slab" --search-endpoint http://localhost:8080 --max-steps 8
  evidence-loop "Minimum cover for a slab" --provider claude-cli --fallback-providers anthropic
  evidence-loop --json "Minimum cover for a slab" > outcome.json`;
}

/** Print usage to stderr */
export function printUsage(): void {
  console.error(getUsageText());
}
