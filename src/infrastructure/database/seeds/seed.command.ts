import { Command, CommandRunner, Option } from 'nest-commander';
import { MenuSeederService } from './menu-seeder.service';

interface SeedCommandOptions {
  clear?: boolean;
  stats?: boolean;
}

@Command({
  name: 'seed',
  description: 'Seed the database with the starter menu and admin account',
})
export class SeedCommand extends CommandRunner {
  constructor(private readonly seederService: MenuSeederService) {
    super();
  }

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  async run(_passedParams: string[], options: SeedCommandOptions): Promise<void> {
    if (options.stats) {
      const stats = await this.seederService.getStats();
      /* eslint-disable no-console */
      console.log('\n📊 Current Menu Stats:');
      console.log(`   Total items: ${stats.totalItems}`);
      console.log('   By category:');
      for (const [category, count] of Object.entries(stats.categories)) {
        console.log(`     - ${category}: ${count}`);
      }
      /* eslint-enable no-console */
      return;
    }

    const summary = options.clear
      ? await this.seederService.reseed()
      : await this.seederService.seed();

    /* eslint-disable no-console */
    console.log('\n✅ Seed completed successfully!');
    console.log(`   Categories created: ${summary.categoriesCreated}`);
    console.log(`   Items created: ${summary.itemsCreated} (skipped ${summary.itemsSkipped})`);
    if (summary.adminCreated) {
      console.log('   Admin account created');
    }
    /* eslint-enable no-console */
  }

  @Option({
    flags: '-c, --clear',
    description: 'Clear the existing menu before seeding',
  })
  parseClear(): boolean {
    return true;
  }

  @Option({
    flags: '-s, --stats',
    description: 'Show current menu statistics',
  })
  parseStats(): boolean {
    return true;
  }
}
