/**
 * Shared statement and NAV table samples
 */

export const NAV_TABLE = `Scheme Code;ISIN Div Payout/ ISIN Growth;ISIN Div Reinvestment;Scheme Name;Net Asset Value;Date

Open Ended Schemes(Equity Scheme - Mid Cap Fund)

Axis Mutual Fund

120503;INF846K01859;-;Axis Midcap Fund - Regular Plan - Growth;98.1200;17-Oct-2026
120505;INF846K01DP8;INF846K01859;Axis Midcap Fund - Regular Plan - IDCW;45.3300;17-Oct-2026
118989;INF109K016L0;INF109K017L8;ICICI Prudential Bluechip Fund - Direct Plan - Growth;112.4500;17-Oct-2026
999999;broken row`;

// Page text as it comes out of PDF extraction, thousands separators included
export const STATEMENT_PAGE_1 = `Consolidated Account Statement
01-Apr-2023 To 30-Sep-2023
Folio No: 12345678 / 90 PAN: ABCDE1234F KYC: OK
B205RG-Axis Midcap Fund - Regular Growth -
ISIN: INF846K01859(Advisor: ARN-0000) Registrar : CAMS
Opening Unit Balance: 0.000
01-Apr-2023 Purchase 5,000.00 87.719 57.0000 87.719
01-Apr-2023 *** Stamp Duty *** 0.25
15-Jun-2023 Redemption (1,000.00) (16.234) 61.6000 71.485
Closing Unit Balance: 71.485`;

export const STATEMENT_PAGE_2 = `Folio No: 99887766 PAN: ABCDE1234F
P8042-ICICI Prudential Bluechip Fund - Direct Plan Growth ISIN: INF109K016L0 Registrar : CAMS
10-Jul-2023 Systematic Investment 2,500.00 30.120 83.0000 30.120`;
