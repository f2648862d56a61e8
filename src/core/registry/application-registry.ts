/**
 * Application Registry
 *
 * A fixed, validated, ordered collection of application specs. Construction
 * rejects anything the manifest assembly cannot cross-check on its own:
 * malformed specs, duplicate ids, unknown dependencies and dependency cycles.
 */

import { type } from 'arktype';
import { DependencyGraph } from '../dependencies/index.js';
import {
  ApplicationValidationError,
  DuplicateIdentifierError,
  formatArktypeError,
  formatCircularDependencyError,
  formatUnknownDependencyError,
} from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { type ApplicationSpec, ApplicationSpecSchema, type OverlayName } from '../types/index.js';
import { deepFreeze } from '../utils/freeze.js';

export class ApplicationRegistry {
  private static readonly logger = getComponentLogger('application-registry');

  private constructor(
    private readonly applications: readonly ApplicationSpec[],
    private readonly graph: DependencyGraph<ApplicationSpec>
  ) {}

  static create(specs: readonly ApplicationSpec[]): ApplicationRegistry {
    const validated: ApplicationSpec[] = [];
    const seen = new Set<string>();

    for (const spec of specs) {
      if (seen.has(spec.id)) {
        throw new DuplicateIdentifierError(spec.id);
      }
      seen.add(spec.id);

      const result = ApplicationSpecSchema(spec);
      if (result instanceof type.errors) {
        throw formatArktypeError(result, spec.id);
      }
      if (result.service && result.ports.length === 0) {
        throw new ApplicationValidationError(
          `Application '${spec.id}' exposes a Service but declares no ports`,
          spec.id,
          'service',
          ['Add the container ports the Service should expose', 'Set service to false']
        );
      }
      validated.push(deepFreeze(structuredClone(result)));
    }

    const graph = new DependencyGraph<ApplicationSpec>();
    for (const application of validated) {
      graph.addNode(application.id, application);
    }

    const knownIds = validated.map((application) => application.id);
    for (const application of validated) {
      for (const dependencyId of application.dependsOn) {
        if (!graph.hasNode(dependencyId)) {
          throw formatUnknownDependencyError(application.id, dependencyId, knownIds);
        }
        graph.addEdge(application.id, dependencyId);
      }
    }

    const [cycle] = graph.findCycles();
    if (cycle) {
      throw formatCircularDependencyError(cycle);
    }

    ApplicationRegistry.logger.debug('Application registry built', {
      applications: knownIds,
    });

    return new ApplicationRegistry(Object.freeze(validated), graph);
  }

  /**
   * Specs in definition order
   */
  listApplications(): readonly ApplicationSpec[] {
    return this.applications;
  }

  getApplication(id: string): ApplicationSpec | undefined {
    return this.graph.getNode(id)?.value;
  }

  /**
   * Application ids ordered so that every application follows its dependencies
   */
  deploymentOrder(): string[] {
    return this.graph.getTopologicalOrder();
  }

  /**
   * Specs in deployment order
   */
  orderedApplications(): ApplicationSpec[] {
    return this.deploymentOrder().flatMap((id) => {
      const application = this.getApplication(id);
      return application ? [application] : [];
    });
  }

  /**
   * Applications that ship in release output, optionally for a single overlay
   */
  releaseApplications(overlay?: OverlayName): ApplicationSpec[] {
    return this.orderedApplications().filter((application) =>
      overlay === undefined ? application.overlay !== undefined : application.overlay === overlay
    );
  }

  /**
   * Dependency edges as [dependency, dependent] pairs
   */
  dependencyEdges(): Array<[string, string]> {
    return this.graph.getEdges();
  }
}
