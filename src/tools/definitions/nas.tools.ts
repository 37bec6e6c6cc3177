import { ParameterTypes } from '../base/ToolBuilder.js';
import type { ToolConfig } from '../base/ToolBuilder.js';

export const nasToolConfigs: ToolConfig[] = [
  {
    name: 'upload_directory',
    description:
      'Uploads a local directory tree to the NAS share over SMB, creating remote directories as needed. ' +
      'Existing remote files are skipped unless overwrite is set',
    category: 'nas',
    parameters: {
      local_path: ParameterTypes.string('Local directory to upload'),
      remote_path: ParameterTypes.string('Path on the share to upload into (default: NAS_PATH)'),
      overwrite: ParameterTypes.boolean('Overwrite existing files on the NAS', false),
      dry_run: ParameterTypes.dryRun(),
    },
    required: ['local_path'],
  },
  {
    name: 'test_connection',
    description: 'Runs read-only connection checks against the mail server and/or the NAS share',
    category: 'nas',
    parameters: {
      mail: ParameterTypes.boolean('Test the IMAP connection', true),
      nas: ParameterTypes.boolean('Test the NAS SMB connection', false),
      dry_run: ParameterTypes.boolean('For the NAS check, only show what would be tested', false),
      provider: ParameterTypes.provider(),
    },
  },
];
