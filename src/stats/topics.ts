import type { SourceMessage } from '../swarm/types.js';

/** Increment a message contributes to a topic, or null for no change. */
export type StatClassifier = (message: SourceMessage) => number | null;

export type StatTopic = {
  title: string;
  classify: StatClassifier;
};

export const DEFAULT_STAT_TOPICS: readonly StatTopic[] = [
  { title: 'Total Messages Sent', classify: () => 1 },
  {
    title: 'Total Attachments Sent',
    classify: (message) => (message.attachments.length > 0 ? message.attachments.length : null),
  },
];
