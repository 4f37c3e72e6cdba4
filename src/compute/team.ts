/**
 * Team Overview Calculator
 *
 * Per-user hours and entry counts over a trailing window.
 */

import type { TickClient } from '../tick/client.js';
import type { Entry, User } from '../tick/types.js';
import { isWithin, trailingWindow } from './dates.js';
import { round, userDisplayName } from './lookup.js';
import type {
  DateRange,
  ReportingPolicy,
  TeamMemberActivity,
  TeamOverview,
} from './types.js';

/**
 * Group entries by user. Every listed user appears, with zero when idle;
 * entries from users missing from the list still count. A member is active
 * once their hours in the window are above zero.
 */
export function buildTeamOverview(window: DateRange, users: User[], entries: Entry[]): TeamOverview {
  const members = new Map<number, TeamMemberActivity>();

  for (const user of users) {
    members.set(user.id, {
      user_id: user.id,
      name: userDisplayName(user) || `User ${user.id}`,
      email: user.email ?? '',
      timezone: user.timezone ?? '',
      hours: 0,
      entries: 0,
      is_active: false,
    });
  }

  for (const entry of entries) {
    if (!isWithin(entry.date, window)) continue;

    let member = members.get(entry.user_id);
    if (!member) {
      member = {
        user_id: entry.user_id,
        name: `User ${entry.user_id}`,
        email: '',
        timezone: '',
        hours: 0,
        entries: 0,
        is_active: false,
      };
      members.set(entry.user_id, member);
    }
    member.hours += entry.hours ?? 0;
    member.entries++;
    member.is_active = member.hours > 0;
  }

  const sorted = [...members.values()]
    .map((member) => ({ ...member, hours: round(member.hours) }))
    .sort((a, b) => b.hours - a.hours || a.name.localeCompare(b.name));

  const active = sorted.filter((member) => member.is_active);
  const totalHours = active.reduce((sum, member) => sum + member.hours, 0);

  return {
    date_range: window,
    total_users: sorted.length,
    active_users: active.length,
    total_hours: round(totalHours),
    average_hours_per_active_user: round(totalHours / Math.max(1, active.length)),
    members: sorted,
  };
}

export class TeamOverviewCalculator {
  private client: TickClient;
  private policy: ReportingPolicy;

  constructor(client: TickClient, policy: ReportingPolicy) {
    this.client = client;
    this.policy = policy;
  }

  async overview(): Promise<TeamOverview> {
    const window = trailingWindow(this.policy.teamWindowDays, this.policy.now());

    const users = await this.client.listUsers();
    const entries = await this.client.listAllEntries({ start_date: window.from, end_date: window.to });

    return buildTeamOverview(window, users, entries);
  }
}
