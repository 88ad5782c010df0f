// pattern: Functional Core
import { REVISION_ALERT_ID } from "../pipeline/types";
import type { RevisionAlert } from "./types";

export function buildRevisionAlert(
  summary: string,
  portalUrl: string | undefined,
): RevisionAlert {
  const url = portalUrl ?? "";
  const action = url
    ? `Confirm the revision in the crew portal: ${url}`
    : "Confirm the revision in the crew portal.";

  return {
    title: "Schedule Revision Pending",
    body: `${summary}\n${action}`,
    identifier: REVISION_ALERT_ID,
    deepLink: { action: "openPortal", url },
  };
}
