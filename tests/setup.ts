import { setLogLevel } from '../src/lib/logger.js';

// 測試時只輸出錯誤日誌
setLogLevel('error');
