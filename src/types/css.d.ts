/**
 * CSS 文件类型声明
 * 组件以副作用方式 import 样式文件
 */

declare module '*.css';
