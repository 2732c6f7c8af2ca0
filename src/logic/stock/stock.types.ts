export interface StockMatch {
    symbol: string;
    name: string;
    type?: string;
    region?: string;
    currency?: string;
    matchScore?: number;
}
