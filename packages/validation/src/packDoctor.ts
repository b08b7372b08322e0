/**
 * Pack Doctor
 *
 * Complete checking pass over a resource pack:
 * preconditions, backup, auto-fix choice, pack.mcmeta, then the
 * reference reconciliation of models and textures.
 */

import {
  FixPrompter,
  RunStateMachine,
  createBackup,
  createRunContext,
  resolvePackPaths,
  type BackupResult,
  type Confirmer,
  type FindingListener,
  type FixFinding,
  type PackDefaults,
  type PackIssue,
  type ReconciliationReport,
  type RunState,
  type RunStateTransition,
} from '@pack-doctor/core';
import { createLogger, type Logger } from '@pack-doctor/utils';
import { checkPackMeta } from './metadataValidator.js';
import { checkPackLayout } from './preconditions.js';
import { checkReferences, walkPack } from './reconciler.js';

export type RunStatus = 'clean' | 'fixed' | 'unrecoverable' | 'no-quick-fix';

export interface RunOutcome {
  status: RunStatus;
  issue?: PackIssue;
  findings: FixFinding[];
  report?: ReconciliationReport;
  backup?: BackupResult;
  history: RunStateTransition[];
}

export interface PackDoctorOptions {
  root: string;
  confirmer: Confirmer;
  // Ask at the start of every pass when not set
  autoFix?: boolean;
  backup?: boolean;
  defaults?: Partial<PackDefaults>;
  indent?: number;
  onFinding?: FindingListener;
  onStateChange?: (transition: RunStateTransition) => void;
  now?: () => Date;
  logger?: Logger;
}

export const AUTO_FIX_QUESTION = 'Do you want every issue fixed automatically?';

export class PackDoctor {
  private readonly options: PackDoctorOptions;
  private readonly logger: Logger;
  private backupResult?: BackupResult;

  constructor(options: PackDoctorOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger({ pack: resolvePackPaths(options.root).root });
  }

  /**
   * Backup taken by an earlier pass of this instance, if any
   */
  getBackup(): BackupResult | undefined {
    return this.backupResult;
  }

  /**
   * Perform one checking pass
   */
  async run(): Promise<RunOutcome> {
    const machine = new RunStateMachine();
    const prompter = new FixPrompter({
      confirmer: this.options.confirmer,
      autoFix: this.options.autoFix,
      logger: this.logger,
      onFinding: this.options.onFinding,
    });
    const ctx = createRunContext(this.options.root, prompter, {
      defaults: this.options.defaults,
      indent: this.options.indent,
      logger: this.logger,
    });

    const finish = (status: RunStatus, extra: Partial<RunOutcome> = {}): RunOutcome => {
      this.logger.info({ status, findings: prompter.getFindings().length }, 'Pass finished');
      return {
        status,
        findings: [...prompter.getFindings()],
        backup: this.backupResult,
        history: [...machine.getHistory()],
        ...extra,
      };
    };

    this.transition(machine, 'PRECONDITION_CHECK');
    const layout = await checkPackLayout(ctx.paths);
    if (!layout.ok) {
      this.transition(machine, 'ABORTED', layout.issue.code);
      return finish('unrecoverable', { issue: layout.issue });
    }

    if (this.options.backup !== false && this.backupResult === undefined) {
      this.transition(machine, 'BACKUP');
      const backup = await createBackup(ctx.paths, this.options.now?.() ?? new Date());
      if (!backup.ok) {
        this.transition(machine, 'ABORTED', backup.issue.code);
        return finish('unrecoverable', { issue: backup.issue });
      }
      this.backupResult = backup.value;
    }

    this.transition(machine, 'CONFIRM_AUTO_FIX');
    if (this.options.autoFix === undefined) {
      prompter.setAutoFix(await this.options.confirmer.confirm(AUTO_FIX_QUESTION));
    }

    this.transition(machine, 'METADATA_CHECK');
    await checkPackMeta(ctx);

    this.transition(machine, 'TREE_WALK');
    const walked = await walkPack(ctx);
    if (!walked.ok) {
      this.transition(machine, 'FAILED', walked.issue.code);
      return finish('no-quick-fix', { issue: walked.issue });
    }

    this.transition(machine, 'REPORT');
    const references = checkReferences(ctx, walked.value);
    if (!references.ok) {
      this.transition(machine, 'FAILED', references.issue.code);
      return finish('no-quick-fix', { issue: references.issue });
    }

    this.transition(machine, 'DONE');
    return finish(prompter.hasFindings() ? 'fixed' : 'clean', { report: references.value });
  }

  private transition(
    machine: RunStateMachine,
    state: RunState,
    reason?: string
  ): void {
    const transition = machine.transitionTo(state, reason);
    this.logger.debug({ from: transition.from, to: transition.to, reason }, 'Run state changed');
    this.options.onStateChange?.(transition);
  }
}
