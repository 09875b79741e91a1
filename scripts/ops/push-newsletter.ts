/**
 * Push an HTML newsletter file to ActiveCampaign.
 *
 *   npm run ops:push -- newsletter.html --list 3 --name "Jan 2026" --subject "January update" \
 *     [--mode immediate|scheduled|draft] [--at 2026-01-20T10:00:00Z] \
 *     [--address 1] [--text newsletter.txt] [--from-name ...] [--from-email ...] [--reply-to ...]
 *
 * A failed push prints the PushResult, including the ids of any remote objects left behind.
 */

import 'dotenv/config';
import fs from 'fs/promises';
import { getNewsletterPushService } from '../../apps/web/src/lib/activecampaign/service';
import { parsePushArgs } from './lib/push-args';

async function main() {
  try {
    const { htmlFile, textFile, request } = parsePushArgs(process.argv.slice(2));
    if (!htmlFile) {
      console.error('Usage: push-newsletter <html-file> --list <id> --name <campaign> --subject <subject> [options]');
      process.exitCode = 1;
      return;
    }

    const htmlContent = await fs.readFile(htmlFile, 'utf8');
    const textContent = textFile ? await fs.readFile(textFile, 'utf8') : undefined;

    const result = await getNewsletterPushService().pushNewsletter({
      ...request,
      htmlContent,
      textContent,
    });

    if (result.success) {
      console.log(`✅ ${result.message}`);
    } else {
      console.error(`❌ Push failed after ${result.lastCompletedStep}: ${result.message}`);
      process.exitCode = 1;
    }
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    console.error('❌ Failed to push newsletter:', err);
    process.exitCode = 1;
  }
}

void main();
