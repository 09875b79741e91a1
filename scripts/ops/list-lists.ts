import 'dotenv/config';
import { getNewsletterPushService } from '../../apps/web/src/lib/activecampaign/service';

async function main() {
  try {
    const service = getNewsletterPushService();
    const [lists, addresses] = await Promise.all([
      service.listAvailableLists(),
      service.listMailingAddresses(),
    ]);

    if (lists.length === 0) {
      console.log('No subscriber lists found in this ActiveCampaign account.');
    } else {
      console.log(`📋 ${lists.length} subscriber list(s):`);
      console.table(
        lists.map((list) => ({ id: list.id, name: list.name, subscribers: list.subscriberCount }))
      );
    }

    if (addresses.length > 0) {
      console.log('📮 Mailing addresses (use with --address):');
      console.table(addresses.map((address) => ({ id: address.id, address: address.display })));
    }
  } catch (err) {
    console.error('❌ Failed to fetch ActiveCampaign lists:', err);
    process.exitCode = 1;
  }
}

void main();
