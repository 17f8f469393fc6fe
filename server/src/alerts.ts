import type { Alert, Severity } from "./model";

export type AlertLog = {
  push: (message: string, severity: Severity, type?: string) => Alert;
  list: () => Alert[];
  latest: (count: number) => Alert[];
  readonly size: number;
};

export const createAlertLog = (capacity = 50) => {
  const alerts: Alert[] = [];
  let sequence = 0;

  const push = (message: string, severity: Severity, type = "general") => {
    const alert: Alert = {
      id: ++sequence,
      message,
      severity,
      type,
      timestamp: new Date().toISOString(),
    };
    alerts.push(alert);
    if (alerts.length > capacity) alerts.splice(0, alerts.length - capacity);
    return { ...alert };
  };

  const list = () => alerts.map(_ => ({ ..._ }));

  const latest = (count: number) =>
    alerts.slice(Math.max(0, alerts.length - count)).map(_ => ({ ..._ }));

  return {
    push,
    list,
    latest,
    get size() {
      return alerts.length;
    },
  } satisfies AlertLog;
};
