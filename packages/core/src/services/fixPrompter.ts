/**
 * Fix Prompter
 *
 * Every fixable issue goes through here. The prompter records what was
 * offered and what the operator decided, and skips the question entirely
 * when auto-fix was chosen for the run.
 */

import type { Logger } from '@pack-doctor/utils';

/**
 * Collaborator that asks the operator a yes/no question
 */
export interface Confirmer {
  confirm(question: string): Promise<boolean>;
}

export interface FixFinding {
  code: string;
  message: string;
  path?: string;
  accepted: boolean;
}

/**
 * Called before the operator is asked. `autoFix` is true when the fix is
 * applied without a question.
 */
export type FindingListener = (finding: Omit<FixFinding, 'accepted'>, autoFix: boolean) => void;

export interface FixPrompterOptions {
  confirmer: Confirmer;
  autoFix?: boolean;
  logger?: Logger;
  onFinding?: FindingListener;
}

export class FixPrompter {
  private readonly confirmer: Confirmer;
  private readonly logger?: Logger;
  private readonly onFinding?: FindingListener;
  private readonly findings: FixFinding[] = [];
  private autoFix: boolean;

  constructor(options: FixPrompterOptions) {
    this.confirmer = options.confirmer;
    this.autoFix = options.autoFix ?? false;
    this.logger = options.logger;
    this.onFinding = options.onFinding;
  }

  /**
   * Offer a fix. Resolves true when the fix should be applied.
   */
  async ask(code: string, message: string, path?: string): Promise<boolean> {
    this.logger?.debug({ code, path }, message);
    this.onFinding?.({ code, message, path }, this.autoFix);

    const accepted = this.autoFix || await this.confirmer.confirm(message);
    this.findings.push({ code, message, path, accepted });

    return accepted;
  }

  setAutoFix(autoFix: boolean): void {
    this.autoFix = autoFix;
  }

  isAutoFix(): boolean {
    return this.autoFix;
  }

  getFindings(): ReadonlyArray<FixFinding> {
    return [...this.findings];
  }

  hasFindings(): boolean {
    return this.findings.length > 0;
  }
}
