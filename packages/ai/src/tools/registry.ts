/**
 * Tool Registry
 * Central registry of all available tools
 */

import { z } from 'zod';
import { TOOL_NAMES, type ToolName } from './schemas.js';
import type { AnyTool, Tool } from './types.js';
import { createTask, updateTask, completeTask, deleteTask, breakDownTask } from './actions/tasks.js';
import { listTasks, searchTasks } from './lookup/tasks.js';
import { getTaskInsights } from './advisory/insights.js';
import { suggestSchedule } from './advisory/schedule.js';

/**
 * One tool per name; the mapped type keeps the set closed
 */
export const toolRegistry: { [N in ToolName]: Tool<N> } = {
  create_task: createTask,
  update_task: updateTask,
  complete_task: completeTask,
  delete_task: deleteTask,
  list_tasks: listTasks,
  search_tasks: searchTasks,
  get_task_insights: getTaskInsights,
  suggest_schedule: suggestSchedule,
  break_down_task: breakDownTask,
};

export const allTools: AnyTool[] = TOOL_NAMES.map((name) => toolRegistry[name]);

export function isDestructive(name: ToolName): boolean {
  return toolRegistry[name].destructive;
}

interface FieldInfo {
  type: string;
  optional: boolean;
  description?: string;
}

function describeField(schema: z.ZodTypeAny): FieldInfo {
  let current = schema;
  let optional = false;
  let nullable = false;
  let description = schema.description;

  for (;;) {
    if (current instanceof z.ZodOptional) {
      optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      nullable = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      optional = true;
      current = current.removeDefault();
    } else {
      break;
    }
    description = description ?? current.description;
  }

  let type = 'value';
  if (current instanceof z.ZodEnum) {
    const options: string[] = current.options;
    type = options.join('|');
  } else if (current instanceof z.ZodArray) {
    type = `${describeField(current.element).type}[]`;
  } else if (current instanceof z.ZodString) {
    type = 'string';
  } else if (current instanceof z.ZodNumber) {
    type = 'number';
  } else if (current instanceof z.ZodBoolean) {
    type = 'boolean';
  }

  return { type: nullable ? `${type} or null` : type, optional, description };
}

function objectShape(schema: z.ZodTypeAny): z.ZodRawShape {
  if (schema instanceof z.ZodDefault || schema instanceof z.ZodOptional) {
    return objectShape(schema instanceof z.ZodDefault ? schema.removeDefault() : schema.unwrap());
  }
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    return shape;
  }
  return {};
}

/**
 * Format tools for LLM prompt
 */
export function formatToolsForPrompt(tools: readonly AnyTool[] = allTools): string {
  return tools
    .map((tool) => {
      const params = Object.entries(objectShape(tool.argsSchema))
        .map(([name, field]) => {
          const info = describeField(field);
          const required = info.optional ? '' : ', required';
          const description = info.description ? `: ${info.description}` : '';
          return `    - ${name} (${info.type}${required})${description}`;
        })
        .join('\n');

      const confirm = tool.destructive ? '\n  Requires user confirmation before it runs.' : '';
      return `${tool.name}:
  ${tool.description}${confirm}
  Parameters:
${params || '    (none)'}`;
    })
    .join('\n\n');
}
