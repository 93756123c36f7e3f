import {
  DepsFormat,
  Graph,
  NormalEdge,
  OrderOnlyEdge,
  UnsupportedEdgeKindError,
  fileKey,
  isBuildStep,
} from '@buildplan/model'
import { makeLogger } from '@buildplan/logger'

const logger = makeLogger('emitter')

/** What a backend format can express. Anything else fails emission. */
export interface EmitterCapabilities {
  readonly orderOnly: boolean
  readonly multiOutput: boolean
  readonly responseFiles: boolean
  /** compiler dependency output formats the executor can read */
  readonly depfiles: readonly DepsFormat[]
}

export interface Artifact {
  /** path relative to the build directory */
  readonly path: string
  readonly contents: string
}

export interface ArtifactSet {
  readonly backend: string
  readonly artifacts: readonly Artifact[]
}

type Step = NormalEdge | OrderOnlyEdge

/**
 * Renders a validated Graph into one backend's native build file. Emitters
 * hold no state between calls and never look at another emitter's output.
 */
export abstract class Emitter {
  abstract readonly name: string
  abstract readonly capabilities: EmitterCapabilities
  /** the file the executor reads; the regenerate rule rebuilds it */
  abstract readonly primaryFile: string

  public emit(graph: Graph): ArtifactSet {
    for (const edge of graph.edges) {
      if (isBuildStep(edge)) this.assertSupported(edge)
    }
    const contents = this.render(graph)
    logger.debug(`rendered ${this.primaryFile}`, {
      backend: this.name,
      edges: graph.edges.length,
      bytes: Buffer.byteLength(contents),
    })
    return { backend: this.name, artifacts: [{ path: this.primaryFile, contents }] }
  }

  protected abstract render(graph: Graph): string

  private assertSupported(edge: Step): void {
    const feature = this.unsupportedFeature(edge)
    if (feature) {
      const [output] = edge.outputs
      throw new UnsupportedEdgeKindError(
        this.name,
        feature,
        edge.target,
        output ? fileKey(output) : undefined,
      )
    }
  }

  private unsupportedFeature(edge: Step): string | undefined {
    const { orderOnly, multiOutput, responseFiles, depfiles } = this.capabilities
    const { template } = edge.command
    if (!orderOnly && (edge.kind === 'order-only' || edge.orderOnly.length > 0)) {
      return 'order-only dependencies'
    }
    if (!multiOutput && edge.outputs.length > 1) return 'rules with several outputs'
    if (!responseFiles && template.responseFile) return 'response files'
    if (template.deps && !depfiles.includes(template.deps)) {
      return `${template.deps}-style dependency output`
    }
    return undefined
  }
}
