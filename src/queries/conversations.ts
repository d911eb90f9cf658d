/**
 * Conversation search queries
 *
 * Builders that turn SearchCriteria into Intercom conversation search filters.
 */

import type { SearchCriteria, SearchFilter, SearchQuery } from "@/types";
import type { SearchQueryBuilder } from "@/interfaces";
import { DEFAULT_SEARCH_STATE } from "@/constants";

function requireTeamId(criteria: SearchCriteria): string {
  const teamId = criteria.teamId?.trim();
  if (!teamId) {
    throw new Error("teamId is required for conversation search");
  }
  return teamId;
}

function teamFilter(teamId: string): SearchFilter {
  return { field: "team_assignee_id", operator: "=", value: teamId };
}

/**
 * Conversations assigned to a team and in a given state
 * (state defaults to "open" when the criteria leave it out)
 */
export const conversationsInStateQuery: SearchQueryBuilder = {
  build(criteria: SearchCriteria): SearchQuery {
    const teamId = requireTeamId(criteria);
    return {
      operator: "AND",
      value: [
        teamFilter(teamId),
        { field: "state", operator: "=", value: criteria.state ?? DEFAULT_SEARCH_STATE },
      ],
    };
  },
};

/**
 * Every conversation assigned to a team, whatever its state
 */
export const teamConversationsQuery: SearchQueryBuilder = {
  build(criteria: SearchCriteria): SearchQuery {
    return {
      operator: "AND",
      value: [teamFilter(requireTeamId(criteria))],
    };
  },
};
