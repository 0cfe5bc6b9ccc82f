import ora, { type Ora } from 'ora';

/**
 * Start an ora spinner; silent when progress output is off
 */
export function startSpinner(text: string, showProgress: boolean): Ora {
  return ora({ text, isSilent: !showProgress }).start();
}
