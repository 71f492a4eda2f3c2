export * from './types.js';
export * from './schemas.js';
export * from './registry.js';
export { toTaskView, type TaskView } from './format.js';
export { parseToolCall, executeToolCall, formatToolResults, type ToolObservation } from './executor.js';
export { createTask, updateTask, completeTask, deleteTask, breakDownTask } from './actions/tasks.js';
export { listTasks, searchTasks } from './lookup/tasks.js';
export { getTaskInsights } from './advisory/insights.js';
export { suggestSchedule } from './advisory/schedule.js';
