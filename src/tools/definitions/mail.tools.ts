import { ParameterTypes } from '../base/ToolBuilder.js';
import type { ToolConfig } from '../base/ToolBuilder.js';

export const mailToolConfigs: ToolConfig[] = [
  {
    name: 'list_folders',
    description: 'Lists every mailbox folder with its message count ("?" when a folder cannot be selected)',
    category: 'mail',
    parameters: {
      provider: ParameterTypes.provider(),
    },
  },
  {
    name: 'download_folder',
    description:
      'Downloads every message of a folder to {output_dir}/{folder}/{timestamp}_{uid}_{subject}/email.raw ' +
      'and saves attachments beside it. Messages already on disk with the same size are skipped',
    category: 'mail',
    parameters: {
      folder: ParameterTypes.folder(),
      output_dir: ParameterTypes.string('Local output directory (default: OUTPUT_DIR or ./downloads)'),
      dry_run: ParameterTypes.dryRun(),
      provider: ParameterTypes.provider(),
    },
    required: ['folder'],
  },
  {
    name: 'archive_folder',
    description:
      'Downloads a folder, optionally uploads it to the NAS, removes the local copy and cleans the mailbox. ' +
      'With clean and since but without upload_to_nas, only cleans (no download)',
    category: 'mail',
    parameters: {
      folder: ParameterTypes.folder(),
      output_dir: ParameterTypes.string('Local output directory (default: OUTPUT_DIR or ./downloads)'),
      upload_to_nas: ParameterTypes.boolean('Upload to {NAS_PATH}/{account}/{folder} after downloading', false),
      overwrite: ParameterTypes.boolean('Overwrite files that already exist on the NAS (default: skip them)', false),
      delete_local: ParameterTypes.boolean('Delete the local folder after a successful NAS upload', false),
      clean: ParameterTypes.boolean('Delete messages from the folder after downloading', false),
      since: ParameterTypes.retention(),
      dry_run: ParameterTypes.dryRun(),
      provider: ParameterTypes.provider(),
      ...ParameterTypes.confirmations(),
    },
    required: ['folder'],
  },
];
