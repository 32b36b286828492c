import { WizardSession, type ConfigPersistence } from "../domain/WizardSession.js";
import { LoggingService } from "../infrastructure/LoggingService.js";
import { driveWizard, type IntentSource } from "../lib/intents.js";

export interface WizardIO extends IntentSource {
  render?(session: WizardSession): void;
}

export class WizardCoordinator {
  constructor(
    private readonly persistence: ConfigPersistence,
    private readonly configPath: string,
    private readonly logger: LoggingService
  ) {}

  /** Runs the wizard to completion. Quitting is not a failure. */
  async orchestrateWizard(io: WizardIO): Promise<WizardSession> {
    const session = new WizardSession({ persistence: this.persistence });
    await driveWizard(session, io, current => io.render?.(current));

    if (session.currentStep === "done") {
      this.logger.info(`Config written to ${this.configPath}`);
      this.logger.info("Run `semantic init` to generate shell aliases.");
    } else {
      this.logger.log("setup wizard closed without saving");
    }
    return session;
  }
}
