import { NO_EXTENSION, OrganizerLabels } from './types.js';

export const DEFAULT_LABELS: OrganizerLabels = {
  typePrefix: 'Type ',
  noExtension: 'No Extension',
  similarPrefix: 'Similar',
  oneFolder: 'One Folder',
  duplicatesFolder: 'Duplicates',
  duplicatePrefix: 'Dupe',
  emptyFolders: 'Empty Folders',
};

export function resolveLabels(overrides?: Partial<OrganizerLabels>): OrganizerLabels {
  return { ...DEFAULT_LABELS, ...overrides };
}

/**
 * "Type txt" for ".txt", the no-extension label for NO_EXTENSION
 */
export function typeLabel(extension: string, labels: OrganizerLabels): string {
  if (extension === NO_EXTENSION) {
    return labels.noExtension;
  }
  return `${labels.typePrefix}${extension.slice(1)}`;
}
