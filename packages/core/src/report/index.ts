export {
  formatBanner,
  formatReport,
  formatReportJson,
  formatIdList,
} from './Reporter.js';
