import { parseArgs } from 'util';
import type { PushRequestInput } from '../../../apps/web/src/lib/activecampaign/validator';

export interface PushArgs {
  htmlFile?: string;
  textFile?: string;
  request: PushRequestInput;
}

export function parsePushArgs(argv: string[]): PushArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      list: { type: 'string' },
      name: { type: 'string' },
      subject: { type: 'string' },
      mode: { type: 'string' },
      at: { type: 'string' },
      address: { type: 'string' },
      text: { type: 'string' },
      'from-name': { type: 'string' },
      'from-email': { type: 'string' },
      'reply-to': { type: 'string' },
    },
  });

  return {
    htmlFile: positionals[0],
    textFile: values.text,
    request: {
      listId: values.list,
      campaignName: values.name,
      subject: values.subject,
      deliveryMode: values.mode,
      scheduledDate: values.at,
      addressId: values.address,
      senderName: values['from-name'],
      senderEmail: values['from-email'],
      replyTo: values['reply-to'],
    },
  };
}
