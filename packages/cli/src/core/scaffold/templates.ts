import { BUNDLE_DIR, DEFAULT_REGION } from '@runway/core'

export function cargoToml(name: string): string {
  return [
    '[package]',
    `name = "${name}"`,
    'version = "0.1.0"',
    'edition = "2021"',
    '',
    '[dependencies]',
    'axum = "0.8"',
    'tokio = { version = "1", features = ["full"] }',
    'tracing = "0.1"',
    'tracing-subscriber = "0.3"',
    ''
  ].join('\n')
}

export const MAIN_RS = `use axum::{routing::get, Router};

async fn health() -> &'static str {
    "ok"
}

async fn hello() -> &'static str {
    "Hello from Cloud Run!"
}

#[tokio::main]
async fn main() {
    tracing_subscriber::fmt::init();

    let app = Router::new()
        .route("/health", get(health))
        .route("/", get(hello));

    // Cloud Run injects PORT
    let port = std::env::var("PORT").unwrap_or_else(|_| "8080".to_string());
    let listener = tokio::net::TcpListener::bind(format!("0.0.0.0:{port}"))
        .await
        .expect("failed to bind");
    tracing::info!("listening on {}", listener.local_addr().expect("local addr"));
    axum::serve(listener, app).await.expect("server error");
}
`

export function runwayJson(): string {
  const cfg = {
    project: { projectId: '', region: DEFAULT_REGION },
    build: { extraPackages: [] },
    service: { memory: '512Mi', cpu: 1, maxInstances: 10 }
  }
  return JSON.stringify(cfg, null, 2) + '\n'
}

export const ENV_EXAMPLE = `# Local development values. Upload each one for production with:
#   runway secret set KEY=VALUE
APP_SECRET=change-me
`

export const GITIGNORE = `/target\n.env\n${BUNDLE_DIR}/\n`
