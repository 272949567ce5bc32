/**
 * Target registration signals reach the auto-start function as EventBridge
 * events for CloudTrail-recorded ELBv2 API calls:
 *
 *   { source: 'aws.elasticloadbalancing', detail: { eventName: 'RegisterTargets',
 *     userIdentity: { invokedBy: 'ecs.amazonaws.com' },
 *     requestParameters: { targetGroupArn: 'arn:...' } } }
 *
 * A manual invocation may pass `{ targetGroupArn }` directly, or nothing at all.
 */
export type TargetChangeSignal = {
  source: string;
  eventName?: string;
  /** AWS service that made the call on the caller's behalf, e.g. `ecs.amazonaws.com`. */
  invokedBy?: string;
  targetGroupArn?: string;
  targetCount?: number;
};

export const TARGET_CHANGE_EVENTS = ['RegisterTargets', 'DeregisterTargets'] as const;

export const ECS_SERVICE_PRINCIPAL = 'ecs.amazonaws.com';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function parseTargetChangeEvent(event: unknown): TargetChangeSignal {
  if (!isRecord(event)) {
    return { source: 'manual' };
  }

  const source = stringField(event, 'source') ?? 'manual';
  const detail = event.detail;

  if (isRecord(detail)) {
    const requestParameters = isRecord(detail.requestParameters) ? detail.requestParameters : {};
    const userIdentity = isRecord(detail.userIdentity) ? detail.userIdentity : {};
    const targets = requestParameters.targets;
    return {
      source,
      eventName: stringField(detail, 'eventName'),
      invokedBy: stringField(userIdentity, 'invokedBy'),
      targetGroupArn: stringField(requestParameters, 'targetGroupArn'),
      targetCount: Array.isArray(targets) ? targets.length : undefined,
    };
  }

  return {
    source,
    targetGroupArn: stringField(event, 'targetGroupArn'),
  };
}

/**
 * Signals without a target group (manual runs) always apply. Otherwise the
 * signal must name the configured target group, when one is configured.
 */
export function appliesToTargetGroup(signal: TargetChangeSignal, configuredTargetGroupArn?: string): boolean {
  if (!configuredTargetGroupArn || !signal.targetGroupArn) return true;
  return signal.targetGroupArn === configuredTargetGroupArn;
}
