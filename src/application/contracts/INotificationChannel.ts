import { PendingAction } from "../../domain/entities/PendingAction";

export interface INotificationChannel {
  humanDecisionRequired(action: PendingAction): Promise<void>;
}
