/**
 * Dependency validation for the media engine executable
 */

import which from 'which';
import type { Logger } from 'pino';
import { Result } from '@chorus/shared';
import { ProcessError, PlaybackErrorFactory } from '../../domain/playback';

/**
 * External executables the daemon needs, resolved to absolute paths
 */
export interface ExternalDependencies {
  mpv: string;
}

const INSTALL_SUGGESTIONS: readonly string[] = [
  'apt-get install mpv  # Ubuntu/Debian',
  'dnf install mpv      # Fedora',
  'brew install mpv     # macOS',
  'pacman -S mpv        # Arch Linux'
];

export class DependencyValidator {
  /**
   * Look a command up on PATH; an explicit path is checked as given
   */
  static async checkDependency(command: string): Promise<Result<string, string>> {
    try {
      const resolved = await which(command);
      return { success: true, value: resolved };
    } catch {
      return { success: false, error: `Command '${command}' not found in PATH` };
    }
  }

  static async validateDependencies(mpvExecutable: string): Promise<Result<ExternalDependencies, ProcessError>> {
    const mpv = await this.checkDependency(mpvExecutable);
    if (!mpv.success) {
      return { success: false, error: 'DEPENDENCY_MISSING' };
    }
    return { success: true, value: { mpv: mpv.value } };
  }

  static getInstallationSuggestions(): readonly string[] {
    return INSTALL_SUGGESTIONS;
  }

  /**
   * Validate at startup and log what is missing and how to install it
   */
  static async validateAtStartup(
    mpvExecutable: string,
    logger: Logger
  ): Promise<Result<ExternalDependencies, ProcessError>> {
    const result = await this.validateDependencies(mpvExecutable);

    if (!result.success) {
      logger.fatal(
        {
          ...PlaybackErrorFactory.createProcessError(result.error, { executable: mpvExecutable }),
          install: this.getInstallationSuggestions()
        },
        'mpv is required for audio playback'
      );
      return result;
    }

    logger.info({ mpv: result.value.mpv }, 'External dependencies are available');
    return result;
  }
}
