import chalk from "chalk";

type Write = (text: string) => void;

const toStderr: Write = (text) => {
    process.stderr.write(text);
};

/** Diagnostics for the command line. Program output never goes through here. */
export class Logger {
    constructor(
        public readonly verboseEnabled: boolean = false,
        private readonly write: Write = toStderr,
    ) {}

    public info(message: string): void {
        this.write(`${message}\n`);
    }

    public detail(message: string): void {
        this.write(`${chalk.gray(message)}\n`);
    }

    public verbose(message: string): void {
        if (this.verboseEnabled) this.detail(message);
    }

    public success(message: string): void {
        this.write(`${chalk.green(message)}\n`);
    }

    public error(message: string): void {
        this.write(`${chalk.red(message)}\n`);
    }
}
