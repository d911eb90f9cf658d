/**
 * Unit tests for conversation search query builders
 */

import { describe, it, expect } from "vitest";
import { conversationsInStateQuery, teamConversationsQuery } from "@/queries";

describe("conversationsInStateQuery", () => {
  it("should filter by team and default to open conversations", () => {
    expect(conversationsInStateQuery.build({ teamId: "team-1" })).toEqual({
      operator: "AND",
      value: [
        { field: "team_assignee_id", operator: "=", value: "team-1" },
        { field: "state", operator: "=", value: "open" },
      ],
    });
  });

  it("should use the requested state and trim the team id", () => {
    expect(conversationsInStateQuery.build({ teamId: " team-2 ", state: "snoozed" })).toEqual({
      operator: "AND",
      value: [
        { field: "team_assignee_id", operator: "=", value: "team-2" },
        { field: "state", operator: "=", value: "snoozed" },
      ],
    });
  });

  it("should require a team id", () => {
    expect(() => conversationsInStateQuery.build({ teamId: "" })).toThrow(
      "teamId is required for conversation search",
    );
  });
});

describe("teamConversationsQuery", () => {
  it("should filter by team only", () => {
    expect(teamConversationsQuery.build({ teamId: "team-1", state: "closed" })).toEqual({
      operator: "AND",
      value: [{ field: "team_assignee_id", operator: "=", value: "team-1" }],
    });
  });
});
