import { Logger } from "@marketwatch/shared-utils";
import { formatSummary } from "../core/dispatch";
import { NotificationEvent } from "../core/dto";
import { NotificationChannel } from "../core/ports";

export class LogChannel implements NotificationChannel {
  readonly name = "log";
  private logger: Logger;

  constructor(private sampleSize: number, logger: Logger) {
    this.logger = logger.child("notify");
  }

  async deliver(event: NotificationEvent): Promise<void> {
    this.logger.info(formatSummary(event, this.sampleSize));
  }
}
