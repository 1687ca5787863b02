/**
 * Dashboard fallbacks
 * Synthetic values used when a dashboard sub-call fails
 */

import { CropInsight, DashboardMarketRow, NewsItem } from './dashboard.types';

export const FALLBACK_AI_SUMMARY =
  'Stable weather and moderate market trends this week. Monitor rainfall and wheat prices.';

export function fallbackDashboardMarket(location: string): DashboardMarketRow[] {
  return [
    { commodity: 'Wheat', market: location, modal_price: 2300, max_price: null, min_price: null, arrival_date: '' },
    { commodity: 'Soybean', market: location, modal_price: 5200, max_price: null, min_price: null, arrival_date: '' },
    { commodity: 'Maize', market: location, modal_price: 1850, max_price: null, min_price: null, arrival_date: '' },
  ];
}

export function fallbackCropInsights(): CropInsight[] {
  return [
    { crop: 'Wheat', recommendation_type: null, confidence: 80, reason: ['Favorable conditions'] },
    { crop: 'Maize', recommendation_type: null, confidence: 75, reason: ['Moderate temperatures'] },
    { crop: 'Soybean', recommendation_type: null, confidence: 70, reason: ['Stable market rates'] },
  ];
}

/**
 * Static headlines shown on the dashboard
 */
export function dashboardNews(): NewsItem[] {
  return [
    {
      headline: 'Govt raises MSP for wheat by ₹150/quintal',
      summary: 'Government increases wheat MSP to boost Rabi season earnings.',
      sentiment: 'positive',
    },
    {
      headline: 'Rainfall expected in Northern India this weekend',
      summary: 'IMD predicts moderate rain, farmers advised to delay sowing by 2 days.',
      sentiment: 'neutral',
    },
    {
      headline: 'Soybean exports rise 8% amid global demand',
      summary: 'Soybean prices surge as exports grow globally.',
      sentiment: 'positive',
    },
  ];
}
