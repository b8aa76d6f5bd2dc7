export type OverrideAction = 'approve' | 'flag';

export interface OperatorOverride {
  id: string;
  userId: string;
  recommendationId: string;
  action: OverrideAction;
  reason: string;
  operatorId: string;
  createdAt: string;
}
