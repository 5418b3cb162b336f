/**
 * Argo CD Application client
 *
 * Talks to `applications.argoproj.io/v1alpha1` custom objects through the
 * Kubernetes API. The task only depends on the ApplicationClient interface;
 * tests provide an in-memory implementation.
 */

import * as k8s from '@kubernetes/client-node';
import { z } from 'zod';
import { ConfigurationError } from '../../errors';
import { formatIssues } from '../../config/schema';

const GROUP = 'argoproj.io';
const VERSION = 'v1alpha1';
const PLURAL = 'applications';

const MERGE_PATCH = { headers: { 'Content-Type': 'application/merge-patch+json' } };

const applicationSchema = z.object({
	metadata: z.object({ name: z.string() }).passthrough(),
	status: z.object({
		operationState: z.object({
			phase: z.string().optional(),
			finishedAt: z.string().optional(),
		}).passthrough().optional(),
		sync: z.object({ status: z.string().optional() }).passthrough().optional(),
		health: z.object({ status: z.string().optional() }).passthrough().optional(),
	}).passthrough().optional(),
}).passthrough();

const applicationListSchema = z.object({
	items: z.array(applicationSchema).default([]),
}).passthrough();

export type Application = z.infer<typeof applicationSchema>;

export interface ApplicationClient {
	listApplications(): Promise<Application[]>;
	/** JSON merge patch */
	patchApplication(name: string, patch: Record<string, unknown>): Promise<void>;
	deleteApplication(name: string): Promise<void>;
}

export type ApplicationClientFactory = (namespace: string) => ApplicationClient;

/**
 * Patch requesting a sync of the latest revision, pruning stale resources
 */
export const SYNC_PATCH: Record<string, unknown> = {
	operation: {
		initiatedBy: { username: 'beamline-controller' },
		sync: { revision: 'HEAD', prune: true },
	},
};

/**
 * Patch disabling automated sync, leaving the application in place
 */
export const SUSPEND_PATCH: Record<string, unknown> = {
	spec: { syncPolicy: { automated: null } },
};

export function parseApplicationList(body: unknown): Application[] {
	const result = applicationListSchema.safeParse(body);
	if (!result.success) {
		throw new Error(`Unexpected application list: ${formatIssues(result.error)}`);
	}
	return result.data.items;
}

/**
 * In-cluster credentials when running in a pod, kubeconfig otherwise
 */
export function loadKubeConfig(env: NodeJS.ProcessEnv = process.env): k8s.KubeConfig {
	const kubeConfig = new k8s.KubeConfig();
	if (env.KUBERNETES_SERVICE_HOST) {
		kubeConfig.loadFromCluster();
	} else {
		kubeConfig.loadFromDefault();
	}

	if (!kubeConfig.getCurrentCluster()) {
		throw new ConfigurationError('Could not load Kubernetes configuration: no current cluster');
	}
	return kubeConfig;
}

export class KubernetesApplicationClient implements ApplicationClient {
	private readonly api: k8s.CustomObjectsApi;

	constructor(
		private readonly namespace: string,
		kubeConfig: k8s.KubeConfig = loadKubeConfig()
	) {
		this.api = kubeConfig.makeApiClient(k8s.CustomObjectsApi);
	}

	async listApplications(): Promise<Application[]> {
		const response = await this.api.listNamespacedCustomObject(GROUP, VERSION, this.namespace, PLURAL);
		return parseApplicationList(response.body);
	}

	async patchApplication(name: string, patch: Record<string, unknown>): Promise<void> {
		await this.api.patchNamespacedCustomObject(
			GROUP,
			VERSION,
			this.namespace,
			PLURAL,
			name,
			patch,
			undefined,
			undefined,
			undefined,
			MERGE_PATCH
		);
	}

	async deleteApplication(name: string): Promise<void> {
		await this.api.deleteNamespacedCustomObject(GROUP, VERSION, this.namespace, PLURAL, name);
	}
}

export const createKubernetesApplicationClient: ApplicationClientFactory = (namespace) =>
	new KubernetesApplicationClient(namespace);
