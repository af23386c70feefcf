import { Command } from '@oclif/core';
import { runAdPresenceMonitor, collectVideoIds } from '../monitor.js';
import { buildDetectorOptions, detectArgs, detectFlags } from './detect-options.js';
import { initializeLogger } from '../utils/logger.js';
import { AppError } from '../common/AppError.js';
import { initTracer, shutdownTracer } from '../tracer.js';

/**
 * Checks videos for delivered ads and writes ad_detection_results.csv/.json.
 */
export default class Detect extends Command {
  static override args = detectArgs;
  static override strict = false;
  static override description =
    'Detects whether videos are served with ads, using markup, network and player-UI signals.\nVideos can be given as arguments or in an input file (TXT, CSV, JSON).';
  static override examples = [
    '<%= config.bin %> <%= command.id %> dQw4w9WgXcQ https://youtu.be/9bZkp7q19f0',
    '<%= config.bin %> <%= command.id %> --inputFile videos.csv --numLoads 5 --outputDir results',
    '<%= config.bin %> <%= command.id %> --inputFile videos.txt --no-chromeChannel --executablePath /usr/bin/chromium',
    '<%= config.bin %> <%= command.id %> --inputFile videos.json --absentEvidence unknown --trace',
  ];
  static override flags = detectFlags;

  public async run(): Promise<void> {
    const { argv, flags } = await this.parse(Detect);
    const logger = initializeLogger(flags.logDir, flags.verbose);

    const inline = argv.filter((value): value is string => typeof value === 'string');
    const videoIds = collectVideoIds(inline, flags.inputFile, logger);
    if (videoIds.length === 0) {
      this.error('No videos to check. Pass video URLs/IDs as arguments or use --inputFile.', {
        exit: 1,
      });
    }

    const tracing = flags.trace ? initTracer(logger) : false;
    logger.info('Starting ad-presence detection with options:');
    logger.info(JSON.stringify({ ...flags, videos: videoIds.length }, null, 2));

    try {
      const { summary, files } = await runAdPresenceMonitor({
        videoIds,
        outputDir: flags.outputDir,
        delaySeconds: flags.delay,
        detector: buildDetectorOptions(flags),
        logger,
      });
      this.log(
        `Checked ${summary.total} video(s): ${summary.withAds} with ads, ${summary.withoutAds} without, ${summary.unknown} unknown.`
      );
      this.log(`Results written to ${files.csvPath}`);
    } catch (error: unknown) {
      let userMessage = 'An unexpected error occurred during ad detection.';
      const suggestions = ['Check logs for more details.'];

      if (error instanceof AppError) {
        logger.error(`AppError during ad detection: ${error.message}`, {
          details: error.details ? JSON.stringify(error.details, null, 2) : undefined,
          stack: error.stack,
        });
        userMessage = `Detection failed with code: ${error.code}. Message: ${error.message}`;
        if (error.code === 'BROWSER_LAUNCH_FAILED') {
          suggestions.push(
            'Install Google Chrome, or pass --no-chromeChannel with --executablePath (or set CHROME_EXECUTABLE_PATH).'
          );
        }
      } else if (error instanceof Error) {
        logger.error(`Error during ad detection: ${error.message}`, { stack: error.stack });
        userMessage = error.message;
      } else {
        logger.error('An unknown error occurred during ad detection.', {
          errorDetail: JSON.stringify(error, null, 2),
        });
      }

      this.error(userMessage, { exit: 1, suggestions });
    } finally {
      if (tracing) {
        await shutdownTracer(logger);
      }
    }
  }
}
