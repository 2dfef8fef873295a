import { Command } from 'commander';
import { configManager } from '../config';
import { ImageUpdaterError } from '../errors';
import { createRegistryClient } from '../image/client';
import { imageParser, isPinned } from '../image/parser';

const digest = new Command('digest')
  .description('Print the registry digest an image reference currently resolves to')
  .argument('<image>', 'Image reference, e.g. nginx:1.25 or ghcr.io/org/app:main')
  .action(async (image: string) => {
    try {
      const reference = imageParser.parse(image);
      const value = isPinned(reference)
        ? reference.digest
        : await createRegistryClient(configManager.load()).getDigest(reference);

      console.log(`Registry:   ${reference.registry}`);
      console.log(`Repository: ${reference.repository}`);
      console.log(`Tag:        ${reference.tag}`);
      console.log(`Digest:     ${value}`);
    } catch (error) {
      if (error instanceof ImageUpdaterError) {
        console.error(`Error: ${error.message}`);
        process.exit(1);
      }
      throw error;
    }
  });

export default digest;
