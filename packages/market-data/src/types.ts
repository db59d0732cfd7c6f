// Records returned by the provider clients.
// Key names follow the research report contract (snake_case), since they are
// forwarded to the model prompts and into the raw-data snapshot unchanged.

export interface StockInfo {
  symbol: string;
  company_name: string;
  sector: string;
  industry: string;
  market_cap: number;
  current_price: number;
  previous_close: number;
  open_price: number;
  day_high: number;
  day_low: number;
  volume: number;
  pe_ratio: number | null;
  forward_pe: number | null;
  '52_week_high': number;
  '52_week_low': number;
  beta: number | null;
  dividend_yield: number | null;
  profit_margin: number | null;
  operating_margin: number | null;
  revenue: number;
  earnings_growth: number | null;
  revenue_growth: number | null;
  ebitda: number | null;
  debt_to_equity: number | null;
  return_on_equity: number | null;
  currency: string;
  [key: string]: unknown;
}

export interface NewsItem {
  title: string;
  publisher: string;
  link: string;
  published_date: string;
  type: string;
  [key: string]: unknown;
}

export interface CompanyOverview {
  symbol: string;
  name: string;
  description: string;
  sector: string;
  eps: number | null;
  book_value: number | null;
  dividend_yield: number | null;
  analyst_target_price: number | null;
  peg_ratio: number | null;
  profit_margin: number | null;
  return_on_equity: number | null;
  quarterly_revenue_growth: number | null;
  quarterly_earnings_growth: number | null;
  [key: string]: unknown;
}

export interface MacroObservation {
  date: string;
  value: number;
}

export interface MacroSeries {
  series_id: string;
  latest_value: number;
  latest_date: string;
  observations: MacroObservation[];
  [key: string]: unknown;
}

export interface Filing {
  form: string;
  filing_date: string;
  accession_number: string;
  primary_document: string;
  [key: string]: unknown;
}

export interface FilingsReport {
  symbol: string;
  cik: string;
  company_name: string;
  filings: Filing[];
  [key: string]: unknown;
}

export interface FilingsError {
  symbol: string;
  error: string;
  [key: string]: unknown;
}

export type FilingsResult = FilingsReport | FilingsError;
