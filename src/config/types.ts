/**
 * coffeepair Configuration Types
 */

export interface SlackConfig {
  // xoxb-... bot token; falls back to SLACK_BOT_TOKEN / SLACK_API_TOKEN
  token?: string;
}

export interface HistoryConfig {
  // How far back to look for previous announcements
  lookbackDays: number;
}

export interface ScheduleConfig {
  cron: string;           // Cron expression: "0 9 * * 1"
  timezone?: string;      // IANA timezone, server local time when unset
  logPath?: string;       // JSONL event log (default: ./coffeepair-log.jsonl)
}

export interface CoffeePairConfig {
  slack: SlackConfig;

  // Channel whose members get paired and where announcements go
  channel: string;

  // Where announcements go in testing mode (members still come from `channel`)
  testingChannel: string;

  // Testing mode: silent @name rendering, post to testingChannel
  testing: boolean;

  history: HistoryConfig;

  // Used by `coffeepair serve`
  schedule: ScheduleConfig;
}

export const DEFAULT_CONFIG: CoffeePairConfig = {
  slack: {},
  channel: '#randomcoffees',
  testingChannel: '#bot_testing',
  testing: false,
  history: {
    lookbackDays: 60,
  },
  schedule: {
    cron: '0 9 * * 1', // Mondays at 09:00
  },
};
