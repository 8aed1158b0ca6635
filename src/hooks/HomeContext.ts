/**
 * 首页 Context - 纯 Context 定义文件
 */

import { createContext } from 'react';
import type { HomeRuntime } from '../store/homeRuntime';

export const HomeContext = createContext<HomeRuntime | null>(null);
