/** Sink for engine warnings; `console` unless the caller injects one */
export type Logger = Pick<Console, 'warn'>;

export const WARNING_PREFIX = '[fieldwarden] warning:';

export function warn(logger: Logger | false, message: string): void {
  if (logger === false) return;
  logger.warn(`${WARNING_PREFIX} ${message}`);
}
