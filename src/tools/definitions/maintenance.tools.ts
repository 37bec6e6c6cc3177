import { ParameterTypes } from '../base/ToolBuilder.js';
import type { ToolConfig } from '../base/ToolBuilder.js';

export const maintenanceToolConfigs: ToolConfig[] = [
  {
    name: 'clean_folder',
    description:
      'Permanently deletes messages from a folder, optionally only those older than `since`. ' +
      'Requires both confirm and confirm_irreversible; use dry_run to preview the match count',
    category: 'maintenance',
    parameters: {
      folder: ParameterTypes.folder(),
      since: ParameterTypes.retention(),
      dry_run: ParameterTypes.dryRun(),
      provider: ParameterTypes.provider(),
      ...ParameterTypes.confirmations(),
    },
    required: ['folder'],
  },
];
