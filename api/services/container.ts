import { AnnotationStore } from './annotationStore';
import { CredentialStore } from './credentials';
import { DocumentStore } from './documentStore';
import { AnnotationExporter } from './exporters';
import { JsonFileStore } from './jsonStore';
import { KeyedMutex } from './keyedMutex';
import { LabelStore } from './labelStore';
import { NamespaceResolver } from './namespaces';
import { SessionRegistry } from './sessions';

export interface AppServices {
  credentials: CredentialStore;
  sessions: SessionRegistry;
  namespaces: NamespaceResolver;
  documents: DocumentStore;
  annotations: AnnotationStore;
  labels: LabelStore;
  exporter: AnnotationExporter;
}

/**
 * Wires every store against one data directory. All stores share a single
 * file store, and with it one set of per-file locks.
 */
export function createServices(dataDir: string): AppServices {
  const files = new JsonFileStore(new KeyedMutex());
  const documents = new DocumentStore(files);
  const annotations = new AnnotationStore(files);
  return {
    credentials: new CredentialStore(dataDir, files),
    sessions: new SessionRegistry(),
    namespaces: new NamespaceResolver(dataDir),
    documents,
    annotations,
    labels: new LabelStore(files),
    exporter: new AnnotationExporter(documents, annotations),
  };
}
