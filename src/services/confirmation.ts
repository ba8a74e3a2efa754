import readline from "readline";

export interface ConfirmationPort {
  ask(title: string, message: string): Promise<boolean>;
}

/** Asks on the operator's terminal; anything but y/yes counts as no. */
export class TerminalConfirmation implements ConfirmationPort {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(title: string, message: string): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      rl.question(`\n[${title}] ${message} (y/N) `, (answer) => {
        rl.close();
        resolve(/^y(es)?$/i.test(answer.trim()));
      });
    });
  }
}
