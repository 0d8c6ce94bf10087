import type {
	AvailableCodeAction,
	CodeAction,
	CodeActionProvider,
	ResolvedTask,
	ResolvedTasks,
	TaskSourceKind,
} from '../../src/types';
import type { EditorState } from '@codemirror/state';

export class RecordingActionProvider implements CodeActionProvider {
	readonly id = 'test-actions';
	applied: CodeAction[] = [];
	failWith: Error | null = null;

	applyCodeAction(_buffer: EditorState, action: CodeAction): Promise<void> {
		this.applied.push(action);
		return this.failWith ? Promise.reject(this.failWith) : Promise.resolve();
	}
}

export const createTask = (label: string): ResolvedTask => ({
	id: `task-${label}`,
	resolvedLabel: label,
	command: 'npm',
	args: ['run', label],
});

export const createTasks = (...labels: string[]): ResolvedTasks => ({
	templates: labels.map((label): [TaskSourceKind, ResolvedTask] => [
		{ kind: 'userInput' },
		createTask(label),
	]),
});

export const createActions = (
	provider: CodeActionProvider,
	...titles: string[]
): AvailableCodeAction[] =>
	titles.map((title, excerptId) => ({ excerptId, action: { title }, provider }));
