import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitKnowledgeGraph1772400000000 implements MigrationInterface {
  name = 'InitKnowledgeGraph1772400000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE TABLE "projects" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "topic" character varying(200) NOT NULL, "reference_materials" jsonb NOT NULL DEFAULT '[]', "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_projects" PRIMARY KEY ("id"))`);
    await queryRunner.query(`CREATE TABLE "knowledge_nodes" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "project_id" uuid NOT NULL, "title" character varying(200) NOT NULL, "summary" text, "mastery" real NOT NULL DEFAULT '0', CONSTRAINT "CHK_knowledge_nodes_mastery" CHECK ("mastery" BETWEEN 0 AND 1), CONSTRAINT "PK_knowledge_nodes" PRIMARY KEY ("id"))`);
    await queryRunner.query(`CREATE INDEX "IDX_knowledge_nodes_project" ON "knowledge_nodes" ("project_id")`);
    await queryRunner.query(`CREATE TABLE "learning_objectives" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "node_id" uuid NOT NULL, "description" text NOT NULL, "position" smallint NOT NULL DEFAULT '0', "mastery" real NOT NULL DEFAULT '0', CONSTRAINT "CHK_learning_objectives_mastery" CHECK ("mastery" BETWEEN 0 AND 1), CONSTRAINT "PK_learning_objectives" PRIMARY KEY ("id"))`);
    await queryRunner.query(`CREATE INDEX "IDX_learning_objectives_node" ON "learning_objectives" ("node_id")`);
    await queryRunner.query(`CREATE TABLE "prerequisite_edges" ("source_node_id" uuid NOT NULL, "target_node_id" uuid NOT NULL, "project_id" uuid NOT NULL, "confidence" real, "rationale" text, CONSTRAINT "PK_prerequisite_edges" PRIMARY KEY ("source_node_id", "target_node_id"))`);
    await queryRunner.query(`CREATE INDEX "IDX_prerequisite_edges_project" ON "prerequisite_edges" ("project_id")`);
    await queryRunner.query(`CREATE TYPE "public"."tutoring_sessions_status_enum" AS ENUM('active', 'completed')`);
    await queryRunner.query(`CREATE TABLE "tutoring_sessions" ("id" uuid NOT NULL, "project_id" uuid NOT NULL, "node_id" uuid NOT NULL, "status" "public"."tutoring_sessions_status_enum" NOT NULL DEFAULT 'active', "started_at" TIMESTAMP WITH TIME ZONE NOT NULL, "ended_at" TIMESTAMP WITH TIME ZONE, "final_score" real, CONSTRAINT "PK_tutoring_sessions" PRIMARY KEY ("id"))`);
    await queryRunner.query(`CREATE INDEX "IDX_tutoring_sessions_node" ON "tutoring_sessions" ("node_id")`);
    await queryRunner.query(`CREATE TABLE "transcript_entries" ("session_id" uuid NOT NULL, "turn_index" integer NOT NULL, "role" character varying(10) NOT NULL, "content" text NOT NULL, "phase" character varying(40) NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL, CONSTRAINT "PK_transcript_entries" PRIMARY KEY ("session_id", "turn_index"))`);
    await queryRunner.query(`ALTER TABLE "knowledge_nodes" ADD CONSTRAINT "FK_knowledge_nodes_project" FOREIGN KEY ("project_id") REFERENCES "projects"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    await queryRunner.query(`ALTER TABLE "learning_objectives" ADD CONSTRAINT "FK_learning_objectives_node" FOREIGN KEY ("node_id") REFERENCES "knowledge_nodes"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    await queryRunner.query(`ALTER TABLE "prerequisite_edges" ADD CONSTRAINT "FK_prerequisite_edges_source" FOREIGN KEY ("source_node_id") REFERENCES "knowledge_nodes"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    await queryRunner.query(`ALTER TABLE "prerequisite_edges" ADD CONSTRAINT "FK_prerequisite_edges_target" FOREIGN KEY ("target_node_id") REFERENCES "knowledge_nodes"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    await queryRunner.query(`ALTER TABLE "transcript_entries" ADD CONSTRAINT "FK_transcript_entries_session" FOREIGN KEY ("session_id") REFERENCES "tutoring_sessions"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`ALTER TABLE "transcript_entries" DROP CONSTRAINT "FK_transcript_entries_session"`);
    await queryRunner.query(`ALTER TABLE "prerequisite_edges" DROP CONSTRAINT "FK_prerequisite_edges_target"`);
    await queryRunner.query(`ALTER TABLE "prerequisite_edges" DROP CONSTRAINT "FK_prerequisite_edges_source"`);
    await queryRunner.query(`ALTER TABLE "learning_objectives" DROP CONSTRAINT "FK_learning_objectives_node"`);
    await queryRunner.query(`ALTER TABLE "knowledge_nodes" DROP CONSTRAINT "FK_knowledge_nodes_project"`);
    await queryRunner.query(`DROP TABLE "transcript_entries"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_tutoring_sessions_node"`);
    await queryRunner.query(`DROP TABLE "tutoring_sessions"`);
    await queryRunner.query(`DROP TYPE "public"."tutoring_sessions_status_enum"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_prerequisite_edges_project"`);
    await queryRunner.query(`DROP TABLE "prerequisite_edges"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_learning_objectives_node"`);
    await queryRunner.query(`DROP TABLE "learning_objectives"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_knowledge_nodes_project"`);
    await queryRunner.query(`DROP TABLE "knowledge_nodes"`);
    await queryRunner.query(`DROP TABLE "projects"`);
  }
}
