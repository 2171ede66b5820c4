import { AccountCash, AccountInfo } from '@/models';
import { displayValue, dotLeader, formatAmount, rule, signPrefix } from './format';

const WIDTH = 60;

const FIELD_LABELS: Readonly<Record<string, string>> = {
  free: 'Free Cash',
  total: 'Total Value',
  ppl: 'Unrealised PnL',
  result: 'Realised PnL',
  cash: 'Cash Balance',
};

const SIGNED_FIELDS = new Set(['ppl', 'result']);

function block(title: string, body: string[]): string[] {
  return ['', rule('=', WIDTH), title, rule('=', WIDTH), ...body, rule('=', WIDTH), ''];
}

/**
 * Cash balance, one dot-led line per field in API order
 */
export function formatAccountBalance(cash: AccountCash): string[] {
  const body = Object.entries(cash).map(([key, value]) => {
    const label = dotLeader(FIELD_LABELS[key] ?? key.toUpperCase(), 30);

    if (typeof value === 'number') {
      if (SIGNED_FIELDS.has(key)) {
        return `${label} ${signPrefix(value)}${formatAmount(value).padStart(24)}`;
      }
      return `${label} ${formatAmount(value).padStart(25)}`;
    }

    return `${label} ${displayValue(value).padStart(25)}`;
  });

  return block('ACCOUNT BALANCE', body);
}

export function formatAccountInfo(info: AccountInfo): string[] {
  const body = Object.entries(info).map(
    ([key, value]) => `${dotLeader(key.toUpperCase(), 30)} ${displayValue(value).padStart(25)}`
  );

  return block('ACCOUNT INFO', body);
}
