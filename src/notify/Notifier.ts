import { StructuredLogger, logger as rootLogger } from '../core/StructuredLogger';

/**
 * Canal sortant unique. notify() ne rejette jamais : un échec de livraison
 * est journalisé et ne remet pas en cause les observations déjà écrites.
 */
export interface Notifier {
  notify(text: string): Promise<void>;
}

/**
 * Repli quand Telegram est désactivé : le message part dans les logs
 */
export class ConsoleNotifier implements Notifier {
  private readonly logger: StructuredLogger;

  constructor(logger: StructuredLogger = rootLogger) {
    this.logger = logger.child('notify');
  }

  async notify(text: string): Promise<void> {
    this.logger.info(`📱 [CONSOLE] ${text}`);
  }
}
