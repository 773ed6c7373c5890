import { format } from 'date-fns';
import { CURRENCY } from './config';

const NA = 'N/A';

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export const formatInt = (n: number) => integerFormat.format(n);

export const formatPct = (n: number | null) => (n == null ? NA : `${n.toFixed(1)}%`);

export const formatMoney = (amount: number) => `${CURRENCY.prefix}${amount}${CURRENCY.unit}`;

export const reportDate = (d: Date) => format(d, 'dd-MMM-yyyy HH:mm');

export const fileStamp = (d: Date) => format(d, 'yyyyMMdd_HHmm');
