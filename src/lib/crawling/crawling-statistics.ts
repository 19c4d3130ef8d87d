/**
 * Crawling Statistics Tracker
 * Track crawl statistics for one session
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesVisited: number = 0;
  private pagesSkipped: number = 0;
  private pagesFailed: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Record an accepted page
   */
  recordPageVisit(depth: number, time: number): void {
    this.pagesVisited++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  /**
   * Record a page rejected for being a 404, non-HTML or too small
   */
  recordSkipped(): void {
    this.pagesSkipped++;
  }

  /**
   * Record a page lost to a network or HTTP error
   */
  recordFailed(): void {
    this.pagesFailed++;
  }

  getStatistics(): CrawlingStatistics {
    const totalTime = Date.now() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;
    const totalAttempts = this.pagesVisited + this.pagesSkipped + this.pagesFailed;

    return {
      pagesVisited: this.pagesVisited,
      pagesSkipped: this.pagesSkipped,
      pagesFailed: this.pagesFailed,
      depthReached: this.maxDepthReached,
      totalTime,
      averagePageTime: Math.round(averagePageTime),
      successRate: totalAttempts > 0 ? this.pagesVisited / totalAttempts : 0,
    };
  }

  /**
   * One-line summary for logs
   */
  summary(): string {
    const stats = this.getStatistics();
    return (
      `visited=${stats.pagesVisited} skipped=${stats.pagesSkipped} failed=${stats.pagesFailed} ` +
      `depth=${stats.depthReached} time=${stats.totalTime}ms`
    );
  }
}
