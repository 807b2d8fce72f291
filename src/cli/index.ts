/**
 * CLI - serve the demo capabilities or talk to a server.
 */

import { createLogger } from '../util/logger';
import { toError } from '../util/error';
import { parseCommand, UsageError } from './args';

const HELP_TEXT = `
Usage: mcp-engine <command> [options]

Commands:
  serve                                   Serve the demo tools, resources and prompts
    Options:
      --transport, -t <stdio|ws|http>     Carrier (default: stdio)
      --port, -p <port>                   Listen port for ws and http (default: PORT or 3000)
      --host <host>                       Listen address (default: HOST or 127.0.0.1)

  tools <url> | --spawn "<command>"       List the tools of a server
  call <url> | --spawn "<command>" <tool> [json]
                                          Call a tool with JSON object arguments
    Options:
      --timeout <ms>                      Request timeout (default: 30000)

Options:
  -h, --help                              Display this help

Examples:
  mcp-engine serve --transport ws --port 8080
  mcp-engine tools ws://127.0.0.1:8080
  mcp-engine call http://127.0.0.1:3000 add '{"a": 1, "b": 2}'
  mcp-engine call --spawn "mcp-engine serve" echo '{"message": "hi"}'
`;

export async function runCLI(argv: string[] = process.argv.slice(2)): Promise<number> {
    const command = parseCommand(argv);
    switch (command.cmd) {
        case 'help':
            console.log(HELP_TEXT);
            return 0;
        case 'serve': {
            const { runServe } = await import('./serve');
            await runServe(command);
            return 0;
        }
        case 'tools': {
            const { runTools } = await import('./call');
            await runTools(command.target, command.timeout);
            return 0;
        }
        case 'call': {
            const { runCall } = await import('./call');
            return runCall(command.target, command.tool, command.args, command.timeout);
        }
    }
}

/** Run the CLI and set the process exit code; usage errors exit with 2 */
export function main(argv?: string[]): Promise<void> {
    return runCLI(argv).then(
        (code) => {
            process.exitCode = code;
        },
        (err: unknown) => {
            const error = toError(err);
            if (error instanceof UsageError) {
                console.error(`${error.message}\nRun with --help to see available commands`);
                process.exitCode = 2;
            } else {
                createLogger('mcp:cli').error('Fatal error:', error.message);
                process.exitCode = 1;
            }
        },
    );
}

if (require.main === module) {
    void main();
}
