import { describe, expect, it } from 'vitest'
import { expectedMonthCount, isCacheComplete } from './cache-completeness'

const points = (...dates: string[]) => dates.map((date) => ({ date, value: 0.5 }))

describe('isCacheComplete', () => {
  it('never accepts an empty cache', () => {
    expect(isCacheComplete([], null, '2024-01-01', '2024-12-31')).toBe(false)
    expect(isCacheComplete([], 'full_year', '2024-01-01', '2024-12-31')).toBe(false)
  })

  it('needs six distinct months for a full year', () => {
    const five = points('2024-01-01', '2024-02-01', '2024-03-01', '2024-04-01', '2024-05-01')
    expect(isCacheComplete(five, 'full_year', '2024-01-01', '2024-12-31')).toBe(false)
    expect(isCacheComplete([...five, ...points('2024-09-01')], 'full_year', '2024-01-01', '2024-12-31')).toBe(true)
  })

  it('counts months of the year, not year-months', () => {
    const repeated = points('2023-01-01', '2024-01-01', '2023-02-01', '2024-02-01', '2023-03-01', '2024-03-01')
    expect(isCacheComplete(repeated, 'full_year', '2023-01-01', '2024-12-31')).toBe(false)
  })

  it('expects every month of a monthly range', () => {
    expect(isCacheComplete(points('2024-01-01', '2024-02-01'), 'monthly_range', '2024-01-15', '2024-03-20')).toBe(false)
    expect(
      isCacheComplete(points('2024-01-01', '2024-02-01', '2024-03-01'), 'monthly_range', '2024-01-15', '2024-03-20')
    ).toBe(true)
  })

  it('expects a single month when a range wraps the year', () => {
    expect(expectedMonthCount(new Date('2023-11-01T00:00:00Z'), new Date('2024-02-01T00:00:00Z'))).toBe(1)
    expect(isCacheComplete(points('2023-12-01'), 'monthly_range', '2023-11-01', '2024-02-01')).toBe(true)
  })

  it('needs five distinct years for a ten-year average', () => {
    const four = points('2019-01-01', '2020-01-01', '2021-01-01', '2022-01-01')
    expect(isCacheComplete(four, 'ten_year_avg', '2015-01-01', '2024-12-31')).toBe(false)
    expect(isCacheComplete([...four, ...points('2023-01-01')], 'ten_year_avg', '2015-01-01', '2024-12-31')).toBe(true)
  })

  it('accepts any stored point for other analysis types', () => {
    expect(isCacheComplete(points('2024-05-01'), null, '2024-01-01', '2024-06-01')).toBe(true)
    expect(isCacheComplete(points('2024-05-01'), 'seasonal', '2024-01-01', '2024-06-01')).toBe(true)
  })

  it('treats unreadable request dates as incomplete instead of throwing', () => {
    expect(isCacheComplete(points('2024-05-01'), 'monthly_range', 'not-a-date', '2024-06-01')).toBe(false)
  })
})
