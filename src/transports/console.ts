import type { AnalysisError } from "../common/errors.js";
import type { PresentationModel } from "../types.js";
import { formatAnalysisError, formatPresentation } from "./format.js";

export interface ConsoleTransportOptions {
  out?: (text: string) => void;
  err?: (text: string) => void;
}

export class ConsoleTransport {
  readonly name = "console";
  private readonly out: (text: string) => void;
  private readonly err: (text: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.out = options.out ?? ((text) => process.stdout.write(text));
    this.err = options.err ?? ((text) => process.stderr.write(text));
  }

  showPresentation(model: PresentationModel): void {
    this.out(`${formatPresentation(model)}\n`);
  }

  showError(error: AnalysisError): void {
    this.err(`${formatAnalysisError(error)}\n`);
  }
}
