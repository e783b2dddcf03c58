// Third-party dependencies
import chalk from 'chalk';

// Local imports
import { REQUIRED_SCOPES } from './errors';

export interface HelpTopic {
  title: string;
  content: string;
}

export const helpTopics: Record<string, HelpTopic> = {
  config: {
    title: 'Configuration File Format',
    content: `
Configuration File (YAML or JSON):
  source:
    provider: 'gcs'              # 'gcs' (default) or 's3'
    bucket: 'source-bucket-name'
    keyFile: './gcs-sa.json'     # Optional: service account key, ADC otherwise
    projectId: 'my-project'      # Optional

    # For provider 's3' instead:
    # endpoint: 'https://s3.amazonaws.com'
    # accessKey: 'YOUR_ACCESS_KEY'
    # secretKey: 'YOUR_SECRET_KEY'
    # region: 'us-east-1'
    # forcePathStyle: false

  target:
    folderName: 'Bucket Backup'  # Root folder in My Drive, created if missing
    keyFile: './drive-sa.json'   # Optional: service account key, ADC otherwise
    projectId: 'my-project'      # Optional
    requestTimeout: 60000        # Optional: per-request timeout for Drive calls (ms)

  # Optional parameters
  concurrency: 10
  prefix: 'photos/'
  include:
    - "\\.jpg$"
  exclude:
    - '^tmp/'
  dryRun: false
  skipConfirmation: false
  verbose: false
  logFile: './logs/transfer.log'

Command line flags override values from the file.
    `
  },
  auth: {
    title: 'Authentication',
    content: `
Authentication:
  Each service uses either a service account key or Application Default Credentials.

  - Cloud Storage: --gcs-sa <path> (or source.keyFile)
  - Google Drive:  --drive-sa <path> (or target.keyFile)

  Without key files, log in once with the scopes this tool needs:
    gcloud auth application-default login --scopes=${REQUIRED_SCOPES.join(',')}

  User credentials need a project for quota; pass --project <id> or run:
    gcloud auth application-default set-quota-project <PROJECT_ID>

  When a service account writes to Drive, share the destination with the
  service account's email or the files land in the service account's own Drive.
    `
  },
  filters: {
    title: 'Filtering Options',
    content: `
Filtering Options:
  - prefix: Only transfer objects whose keys start with the specified prefix
    Example: prefix: "images/"

  - include: Only transfer objects whose keys match any of the specified regex patterns
  - exclude: Skip objects whose keys match any of the specified regex patterns

  All filtering options are optional and can be used in combination.
    `
  },
  process: {
    title: 'Transfer Process',
    content: `
Transfer Process:
  1. List all objects in the source bucket (applying filters if specified)
  2. Find or create the destination folder in Drive
  3. For each object, in parallel:
     - create the folders of its key path ("a/b/c.txt" -> a/b)
     - skip it when a file with the same name already exists there
     - otherwise download it and upload it to Drive
  4. Display a summary of uploaded, skipped and failed objects

Notes:
  - Keys ending in "/" are folder placeholders and are never uploaded.
  - Existing files are matched by name only; changed content is not re-uploaded.
  - Nothing is ever deleted. Failed objects are reported; re-run to retry them.
  - Remote calls have no deadline unless target.requestTimeout is set.
    `
  }
};

/**
 * Display help information for a specific topic or list all available topics
 */
export function displayHelp(topic: string | undefined, programName: string): void {
  if (!topic) {
    console.log(chalk.blue.bold(`${programName} Help`));
    console.log(chalk.blue('─'.repeat(50)));
    console.log('Available help topics:');
    Object.keys(helpTopics).forEach(key => {
      console.log(`  ${chalk.yellow(key)}: ${helpTopics[key].title}`);
    });
    console.log('\nUse:', chalk.yellow(`${programName} help <topic>`), 'for detailed information');
    return;
  }

  if (helpTopics[topic]) {
    console.log(chalk.blue.bold(helpTopics[topic].title));
    console.log(chalk.blue('─'.repeat(50)));
    console.log(helpTopics[topic].content);
  } else {
    console.log(chalk.red(`Unknown help topic: ${topic}`));
    console.log('Available topics:', Object.keys(helpTopics).join(', '));
  }
}
