export const topics = {
  contentItemDiscovered: "content.item.discovered",
  approvalRequested: "approval.requested",
  approvalDecided: "approval.decided",
  publishFailed: "publish.failed"
} as const;
